import { describe, expect, it } from "vitest";

import { LinkIntrospectionError } from "../../src/gpu/errors";
import { GL } from "../../src/gpu/glEnums";
import { reflectProgram } from "../../src/gpu/ProgramReflection";
import { ShaderProgram } from "../../src/gpu/ShaderProgram";
import { FakeGL, type FakeProgramSpec } from "../support/FakeGL";
import { CAPTURE_PROGRAM, compileCaptureProgram, compileProgram } from "../support/programs";

const MATERIAL_PROGRAM: FakeProgramSpec = {
  attributes: [
    { name: "gl_VertexID", type: GL.INT, location: -1 },
    { name: "normal", type: GL.FLOAT_VEC3, location: 1 },
    { name: "position", type: GL.FLOAT_VEC3, location: 0 },
    { name: "model", type: GL.FLOAT_MAT4, location: 2 },
  ],
  uniforms: [
    { name: "Material.tint", type: GL.FLOAT_VEC3, blockIndex: 0, offset: 16 },
    { name: "Material.roughness", type: GL.FLOAT, blockIndex: 0, offset: 0 },
    { name: "Lights.colors[0]", type: GL.FLOAT_VEC4, size: 2, blockIndex: 1, offset: 0, arrayStride: 16 },
    { name: "diffuse", type: GL.SAMPLER_2D },
    { name: "shadows[0]", type: GL.SAMPLER_2D_SHADOW, size: 2 },
    { name: "time", type: GL.FLOAT },
    { name: "offsets[0]", type: GL.FLOAT_VEC2, size: 4 },
  ],
  blocks: [
    { name: "Material", dataSize: 32 },
    { name: "Lights", dataSize: 32 },
  ],
};

function linkRaw(gl: FakeGL, spec: FakeProgramSpec): object {
  gl.programSpec = spec;
  const program = gl.createProgram();
  if (!program) throw new Error("no program");
  gl.linkProgram(program);
  return program;
}

describe("gpu/ProgramReflection", () => {
  it("reports active attributes sorted by location, skipping built-ins", () => {
    const gl = new FakeGL();
    const iface = compileProgram(gl, MATERIAL_PROGRAM).interface;

    expect(iface.attributes).toEqual([
      { name: "position", location: 0, type: "vec3", arraySize: 1 },
      { name: "normal", location: 1, type: "vec3", arraySize: 1 },
      { name: "model", location: 2, type: "mat4", arraySize: 1 },
    ]);
  });

  it("reports uniform blocks with unqualified members sorted by offset", () => {
    const gl = new FakeGL();
    const iface = compileProgram(gl, MATERIAL_PROGRAM).interface;

    expect(iface.uniformBlocks).toEqual([
      {
        name: "Material",
        index: 0,
        binding: 0,
        byteSize: 32,
        members: [
          { name: "roughness", type: "float", byteOffset: 0, byteSize: 4, arrayStride: 0, matrixStride: 0 },
          { name: "tint", type: "vec3", byteOffset: 16, byteSize: 12, arrayStride: 0, matrixStride: 0 },
        ],
      },
      {
        name: "Lights",
        index: 1,
        binding: 1,
        byteSize: 32,
        members: [
          {
            name: "colors",
            type: "vec4",
            byteOffset: 0,
            byteSize: 32,
            arrayLength: 2,
            arrayStride: 16,
            matrixStride: 0,
          },
        ],
      },
    ]);
  });

  it("assigns sequential texture units to samplers", () => {
    const gl = new FakeGL();
    const iface = compileProgram(gl, MATERIAL_PROGRAM).interface;

    expect(iface.samplers).toEqual([
      { name: "diffuse", kind: "sampler2D", units: [0], isArray: false },
      { name: "shadows", kind: "sampler2DShadow", units: [1, 2], isArray: true },
    ]);
  });

  it("reports plain uniforms with their array length", () => {
    const gl = new FakeGL();
    const iface = compileProgram(gl, MATERIAL_PROGRAM).interface;

    expect(iface.uniforms.map((u) => [u.name, u.type, u.arrayLength])).toEqual([
      ["time", "float", undefined],
      ["offsets", "vec2", 4],
    ]);
  });

  it("reflects at most once per program", () => {
    const gl = new FakeGL();
    const program = compileProgram(gl, MATERIAL_PROGRAM);

    const first = program.interface;
    const second = program.interface;

    expect(second).toBe(first);
    expect(gl.callsTo("getActiveUniformBlockName")).toHaveLength(2);
  });

  it("reports transform feedback varyings and their mode", () => {
    const gl = new FakeGL();
    const iface = compileCaptureProgram(gl).interface;

    expect(iface.varyings).toEqual([{ name: "outValue", index: 0, type: "float", arraySize: 1 }]);
    expect(iface.varyingMode).toBe("interleaved");
    expect(gl.callsTo("transformFeedbackVaryings")).toEqual([[["outValue"], GL.INTERLEAVED_ATTRIBS]]);
  });

  it("reads separate capture mode from the program", () => {
    const gl = new FakeGL();
    const program = compileProgram(gl, CAPTURE_PROGRAM, {
      transformFeedback: { varyings: ["outValue"], mode: "separate" },
    });

    expect(program.interface.varyingMode).toBe("separate");
  });

  it("fails on a program that is not linked", () => {
    const gl = new FakeGL();
    const handle = linkRaw(gl, { linked: false, infoLog: "ERROR: missing main" });

    expect(() => reflectProgram(gl, handle)).toThrow(LinkIntrospectionError);
    expect(() => ShaderProgram.fromLinked(gl, handle)).toThrow("Program is not linked:\nERROR: missing main");
  });

  it("surfaces link errors from compile", () => {
    const gl = new FakeGL();

    try {
      compileProgram(gl, { linked: false, infoLog: "ERROR: varying mismatch" });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(LinkIntrospectionError);
      if (!(error instanceof LinkIntrospectionError)) return;
      expect(error.code).toBe("GL_LINK_INTROSPECTION");
      expect(error.infoLog).toBe("ERROR: varying mismatch");
      expect(error.message).toBe("Program link error:\nERROR: varying mismatch");
    }
  });

  it("surfaces shader compile errors", () => {
    const gl = new FakeGL();
    gl.programSpec = {};

    expect(() => ShaderProgram.compile(gl, "syntax error", "void main() {}")).toThrow(
      "Shader compile error:\nERROR: 0:1: syntax error"
    );
  });

  it("fails on types it does not model", () => {
    const gl = new FakeGL();
    const handle = linkRaw(gl, { attributes: [{ name: "weird", type: 0x1234, location: 0 }] });

    expect(() => reflectProgram(gl, handle)).toThrow("Attribute 'weird' has unsupported type 0x1234");
  });

  it("fails when attributes overlap", () => {
    const gl = new FakeGL();
    const handle = linkRaw(gl, {
      attributes: [
        { name: "model", type: GL.FLOAT_MAT4, location: 0 },
        { name: "color", type: GL.FLOAT_VEC4, location: 2 },
      ],
    });

    expect(() => reflectProgram(gl, handle)).toThrow("Attributes 'model' and 'color' share location 2");
  });

  it("fails when two samplers share a texture unit", () => {
    const gl = new FakeGL();
    // Linked without binding-point assignment: every sampler starts on unit 0.
    const handle = linkRaw(gl, {
      uniforms: [
        { name: "diffuse", type: GL.SAMPLER_2D },
        { name: "normals", type: GL.SAMPLER_2D },
      ],
    });

    expect(() => reflectProgram(gl, handle)).toThrow("'diffuse' and 'normals' share texture unit 0");
  });

  it("wraps externally linked programs with the same binding points", () => {
    const gl = new FakeGL();
    const handle = linkRaw(gl, MATERIAL_PROGRAM);
    const program = ShaderProgram.fromLinked(gl, handle, "external");

    expect(program.label).toBe("external");
    expect(program.interface.uniformBlocks.map((b) => b.binding)).toEqual([0, 1]);
    expect(program.interface.samplers.map((s) => s.units)).toEqual([[0], [1, 2]]);
  });
});
