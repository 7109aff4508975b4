import { describe, expect, it } from "vitest";

import { BindingMismatchError, type BindingMismatch } from "../../src/gpu/errors";
import { GL } from "../../src/gpu/glEnums";
import { DEFAULT_OUTPUTS, buildPipeline, sampler, uniform, type PipelineDescriptor } from "../../src/gpu/PipelineBuilder";
import type { ShaderProgram } from "../../src/gpu/ShaderProgram";
import { std140Block } from "../../src/gpu/std140";
import { vertexBuffer } from "../../src/gpu/VertexLayout";
import { Device } from "../../src/gpu/Device";
import { FakeGL, type FakeProgramSpec } from "../support/FakeGL";
import {
  Globals,
  QUAD_PROGRAM,
  SAMPLED_PROGRAM,
  compileCaptureProgram,
  compileProgram,
  values,
  vertices,
} from "../support/programs";

function mismatchOf(program: ShaderProgram, descriptor: PipelineDescriptor): BindingMismatch | null {
  const result = buildPipeline(program, descriptor);
  return result.ok ? null : result.mismatch;
}

function quad(spec: FakeProgramSpec = QUAD_PROGRAM): ShaderProgram {
  return compileProgram(new FakeGL(), spec, { label: "quad" });
}

describe("gpu/PipelineBuilder", () => {
  describe("matching descriptors", () => {
    it("builds a contract with one entry per active slot", () => {
      const result = buildPipeline(quad(), { vertexBuffers: [vertices], uniformBlocks: [Globals] });
      if (!result.ok) throw new Error("expected a pipeline");
      const { contract } = result.pipeline;

      expect(contract.required.map((e) => [e.slot, e.ordinal, e.category])).toEqual([
        ["vertices", 0, "vertex-buffer"],
        ["Globals", 1, "uniform-block"],
      ]);
      expect(result.pipeline.entry("vertices")).toMatchObject({ tag: "vertex(8){float32x2@0}", arrayStride: 8 });
      expect(result.pipeline.entry("Globals")).toMatchObject({ tag: "block(16){scale:float@0+4}", binding: 0 });
      expect(contract.outputs).toBe(DEFAULT_OUTPUTS);
      expect(contract.capture).toBeNull();
      expect(result.pipeline.label).toBe("quad");
    });

    it("records descriptors that match nothing as ignored", () => {
      const instances = vertexBuffer("instances", [{ name: "offset", format: "float32x2" }], { stepMode: "instance" });
      const result = buildPipeline(quad(), {
        vertexBuffers: [vertices, instances],
        uniformBlocks: [Globals],
        samplers: [sampler("unused", "sampler2D")],
        uniforms: [uniform("time", "float")],
      });
      if (!result.ok) throw new Error("expected a pipeline");

      expect([...result.pipeline.contract.ignored].sort()).toEqual(["instances", "time", "unused"]);
      expect(result.pipeline.contract.required).toHaveLength(2);
    });

    it("expands sampler arrays into one entry per element", () => {
      const program = quad({
        uniforms: [{ name: "layers[0]", type: GL.SAMPLER_2D_ARRAY, size: 3 }],
      });
      const result = buildPipeline(program, { samplers: [sampler("layers", "sampler2DArray")] });
      if (!result.ok) throw new Error("expected a pipeline");

      expect(result.pipeline.contract.required.map((e) => e.slot)).toEqual(["layers[0]", "layers[1]", "layers[2]"]);
    });

    it("derives capture strides from the varyings", () => {
      const gl = new FakeGL();
      const program = compileProgram(
        gl,
        {
          varyings: [
            { name: "outPosition", type: GL.FLOAT_VEC4 },
            { name: "outSize", type: GL.FLOAT },
          ],
        },
        { transformFeedback: { varyings: ["outPosition", "outSize"], mode: "separate" } }
      );
      const result = buildPipeline(program, {
        outputs: null,
        primitive: "points",
        transformFeedback: {
          mode: "separate",
          varyings: [
            { name: "outPosition", type: "vec4" },
            { name: "outSize", type: "float" },
          ],
        },
      });
      if (!result.ok) throw new Error("expected a pipeline");

      expect(result.pipeline.contract.capture).toEqual({
        mode: "separate",
        varyings: ["outPosition", "outSize"],
        bufferStrides: [16, 4],
      });
      expect(result.pipeline.contract.outputs).toBeNull();
    });

    it("reflects the program once across builds", () => {
      const gl = new FakeGL();
      const program = compileProgram(gl, QUAD_PROGRAM);

      buildPipeline(program, { vertexBuffers: [vertices], uniformBlocks: [Globals] });
      buildPipeline(program, { vertexBuffers: [vertices] });
      buildPipeline(program, { uniformBlocks: [Globals] });

      expect(gl.callsTo("getActiveUniformBlockName")).toHaveLength(1);
    });
  });

  describe("mismatches", () => {
    it("reports a missing uniform block", () => {
      expect(mismatchOf(quad(), { vertexBuffers: [vertices] })).toEqual({
        kind: "missing-binding",
        slot: "Globals",
        category: "uniform-block",
      });
    });

    it("reports a missing attribute", () => {
      expect(mismatchOf(quad(), { uniformBlocks: [Globals] })).toEqual({
        kind: "missing-binding",
        slot: "position",
        category: "attribute",
      });
    });

    it("reports a block member at the wrong offset", () => {
      const program = quad({
        ...QUAD_PROGRAM,
        uniforms: [{ name: "Globals.scale", type: GL.FLOAT, blockIndex: 0, offset: 4 }],
      });

      expect(mismatchOf(program, { vertexBuffers: [vertices], uniformBlocks: [Globals] })).toEqual({
        kind: "layout-mismatch",
        slot: "Globals",
        expected: "scale:float@4+4",
        actual: "scale:float@0+4",
      });
    });

    it("reports a block member of the wrong type", () => {
      const wide = std140Block("Globals", { scale: "vec2" });

      expect(mismatchOf(quad(), { vertexBuffers: [vertices], uniformBlocks: [wide] })).toEqual({
        kind: "layout-mismatch",
        slot: "Globals",
        expected: "scale:float@0+4",
        actual: "scale:vec2@0+8",
      });
    });

    it("reports an extra block member", () => {
      const longer = std140Block("Globals", { scale: "float", bias: "float" });

      expect(mismatchOf(quad(), { vertexBuffers: [vertices], uniformBlocks: [longer] })).toEqual({
        kind: "layout-mismatch",
        slot: "Globals",
        expected: "<none>",
        actual: "bias:float@4+4",
      });
    });

    it("reports a block size difference", () => {
      const program = quad({ ...QUAD_PROGRAM, blocks: [{ name: "Globals", dataSize: 32 }] });

      expect(mismatchOf(program, { vertexBuffers: [vertices], uniformBlocks: [Globals] })).toEqual({
        kind: "layout-mismatch",
        slot: "Globals",
        expected: "32 bytes",
        actual: "16 bytes",
      });
    });

    it("reports an attribute with the wrong component count or base type", () => {
      const wide = vertexBuffer("vertices", [{ name: "position", format: "float32x3" }]);
      const integer = vertexBuffer("vertices", [{ name: "position", format: "sint32x2" }]);

      expect(mismatchOf(quad(), { vertexBuffers: [wide], uniformBlocks: [Globals] })).toEqual({
        kind: "type-mismatch",
        slot: "position",
        expected: "vec2",
        actual: "float32x3",
      });
      expect(mismatchOf(quad(), { vertexBuffers: [integer], uniformBlocks: [Globals] })).toEqual({
        kind: "type-mismatch",
        slot: "position",
        expected: "vec2",
        actual: "sint32x2",
      });
    });

    it("reports an explicit attribute location that disagrees", () => {
      const located = vertexBuffer("vertices", [{ name: "position", format: "float32x2", location: 1 }]);

      expect(mismatchOf(quad(), { vertexBuffers: [located], uniformBlocks: [Globals] })).toEqual({
        kind: "layout-mismatch",
        slot: "position",
        expected: "location 0",
        actual: "location 1",
      });
    });

    it("reports sampler kind and unit differences", () => {
      const program = quad(SAMPLED_PROGRAM);
      const base = [sampler("shadowMap", "sampler2DShadow"), sampler("ids", "isampler2D")];

      expect(
        mismatchOf(program, { vertexBuffers: [vertices], samplers: [sampler("diffuse", "isampler2D"), ...base] })
      ).toEqual({ kind: "type-mismatch", slot: "diffuse", expected: "sampler2D", actual: "isampler2D" });
      expect(
        mismatchOf(program, {
          vertexBuffers: [vertices],
          samplers: [sampler("diffuse", "sampler2D", { unit: 3 }), ...base],
        })
      ).toEqual({ kind: "layout-mismatch", slot: "diffuse", expected: "unit 0", actual: "unit 3" });
    });

    it("reports plain uniform type and array differences", () => {
      const program = quad({
        uniforms: [
          { name: "time", type: GL.FLOAT },
          { name: "offsets[0]", type: GL.FLOAT_VEC2, size: 4 },
        ],
      });

      expect(mismatchOf(program, { uniforms: [uniform("time", "vec2"), uniform("offsets", "vec2", { arrayLength: 4 })] }))
        .toEqual({ kind: "type-mismatch", slot: "time", expected: "float", actual: "vec2" });
      expect(mismatchOf(program, { uniforms: [uniform("time", "float"), uniform("offsets", "vec2")] }))
        .toEqual({ kind: "type-mismatch", slot: "offsets", expected: "vec2[4]", actual: "vec2" });
    });

    it("reports two descriptors for one slot", () => {
      expect(mismatchOf(quad(), { vertexBuffers: [vertices, vertices], uniformBlocks: [Globals] })).toEqual({
        kind: "duplicate-binding",
        slot: "vertices",
      });

      const clash = vertexBuffer("Globals", [{ name: "position", format: "float32x2" }]);
      expect(mismatchOf(quad(), { vertexBuffers: [clash], uniformBlocks: [Globals] })).toEqual({
        kind: "duplicate-binding",
        slot: "Globals",
      });
    });

    it("reports capture mismatches", () => {
      const program = compileCaptureProgram(new FakeGL());
      const capture = { mode: "interleaved", varyings: [{ name: "outValue", type: "float" }] } as const;

      expect(mismatchOf(program, { vertexBuffers: [values], outputs: null, primitive: "points" })).toEqual({
        kind: "missing-binding",
        slot: "outValue",
        category: "varying",
      });
      expect(
        mismatchOf(program, {
          vertexBuffers: [values],
          outputs: null,
          primitive: "points",
          transformFeedback: { ...capture, mode: "separate" },
        })
      ).toEqual({ kind: "layout-mismatch", slot: "transformFeedback", expected: "interleaved", actual: "separate" });
      expect(
        mismatchOf(program, {
          vertexBuffers: [values],
          outputs: null,
          primitive: "points",
          transformFeedback: { mode: "interleaved", varyings: [{ name: "outValue", type: "vec2" }] },
        })
      ).toEqual({ kind: "type-mismatch", slot: "outValue", expected: "float", actual: "vec2" });
      expect(
        mismatchOf(program, {
          vertexBuffers: [values],
          outputs: null,
          primitive: "triangle-strip",
          transformFeedback: capture,
        })
      ).toEqual({
        kind: "layout-mismatch",
        slot: "primitive",
        expected: "points | lines | triangles",
        actual: "triangle-strip",
      });
    });

    it("needs outputs unless the pipeline captures", () => {
      expect(mismatchOf(quad(), { vertexBuffers: [vertices], uniformBlocks: [Globals], outputs: null })).toEqual({
        kind: "missing-binding",
        slot: "outputs",
        category: "output",
      });
    });
  });

  describe("fixed-function state", () => {
    const front = { compare: "equal", fail: "keep", depthFail: "keep", pass: "replace" } as const;

    it("fills in defaults", () => {
      const result = buildPipeline(quad(), { vertexBuffers: [vertices], uniformBlocks: [Globals] });
      if (!result.ok) throw new Error("expected a pipeline");

      expect(result.pipeline.state).toEqual({
        primitive: "triangles",
        depth: null,
        stencil: null,
        cullMode: "none",
        blend: "none",
      });
    });

    it("uses the front stencil state for back faces unless given", () => {
      const result = buildPipeline(quad(), {
        vertexBuffers: [vertices],
        uniformBlocks: [Globals],
        stencil: { front, reference: 1 },
      });
      if (!result.ok) throw new Error("expected a pipeline");

      expect(result.pipeline.state.stencil).toEqual({ front, back: front, reference: 1, readMask: 0xff, writeMask: 0xff });
    });

    it("rejects stencil values outside a byte", () => {
      expect(() =>
        buildPipeline(quad(), { vertexBuffers: [vertices], uniformBlocks: [Globals], stencil: { front, writeMask: 256 } })
      ).toThrow("Stencil writeMask must be an integer in 0..255, got 256");
    });
  });

  describe("Device.createPipeline", () => {
    it("throws BindingMismatchError carrying the mismatch", () => {
      const gl = new FakeGL();
      const device = Device.create(gl, { logLevel: "silent" });
      const program = compileProgram(gl, QUAD_PROGRAM);

      try {
        device.createPipeline(program, { label: "quad", vertexBuffers: [vertices] });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(BindingMismatchError);
        if (!(error instanceof BindingMismatchError)) return;
        expect(error.code).toBe("GL_BINDING_MISMATCH");
        expect(error.message).toBe("Pipeline 'quad': no descriptor supplies uniform-block 'Globals'");
        expect(error.mismatch).toEqual({ kind: "missing-binding", slot: "Globals", category: "uniform-block" });
      }
    });

    it("returns the result from tryCreatePipeline", () => {
      const gl = new FakeGL();
      const device = Device.create(gl, { logLevel: "silent" });
      const program = compileProgram(gl, QUAD_PROGRAM);

      const result = device.tryCreatePipeline(program, { vertexBuffers: [vertices], uniformBlocks: [Globals] });

      expect(result.ok).toBe(true);
    });
  });
});
