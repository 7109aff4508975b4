// ProgramReflection — asks a linked program what it actually uses.
//
// The driver only reports *active* inputs (ones the compiled shaders read), so
// the resulting ProgramInterface is exactly the set of slots a pipeline must
// satisfy. Uniform block member offsets and strides come straight from the
// driver (getActiveUniforms), not from our own std140 math, which is what lets
// the pipeline builder catch a descriptor that disagrees with the shader.
//
// Reflection is a burst of synchronous driver queries; ShaderProgram runs it
// once and caches the result.

import { LinkIntrospectionError } from "./errors";
import type { GLContext, GLProgram, GLUniformLocation } from "./GLContext";
import { GL } from "./glEnums";
import type { BlockMember } from "./std140";
import {
  VALUE_TYPES,
  samplerKindFromGL,
  valueTypeFromGL,
  type SamplerKind,
  type ValueType,
} from "./valueTypes";

export interface AttributeSlot {
  readonly name: string;
  readonly location: number;
  readonly type: ValueType;
  readonly arraySize: number;
}

export interface UniformBlockSlot {
  readonly name: string;
  readonly index: number;
  readonly binding: number;
  readonly byteSize: number;
  /** Sorted by byte offset. */
  readonly members: readonly BlockMember[];
}

export interface SamplerSlot {
  readonly name: string;
  readonly kind: SamplerKind;
  /** One texture unit per array element. */
  readonly units: readonly number[];
  readonly isArray: boolean;
}

export interface UniformValueSlot {
  readonly name: string;
  readonly type: ValueType;
  readonly arrayLength?: number;
  readonly location: GLUniformLocation;
}

export interface VaryingSlot {
  readonly name: string;
  readonly index: number;
  readonly type: ValueType;
  readonly arraySize: number;
}

export type VaryingMode = "interleaved" | "separate";

export interface ProgramInterface {
  readonly attributes: readonly AttributeSlot[];
  readonly uniformBlocks: readonly UniformBlockSlot[];
  readonly samplers: readonly SamplerSlot[];
  readonly uniforms: readonly UniformValueSlot[];
  readonly varyings: readonly VaryingSlot[];
  readonly varyingMode: VaryingMode | null;
}

const ARRAY_SUFFIX = "[0]";

function baseName(name: string): string {
  return name.endsWith(ARRAY_SUFFIX) ? name.slice(0, -ARRAY_SUFFIX.length) : name;
}

function isBuiltin(name: string): boolean {
  return name.startsWith("gl_");
}

function programNumber(gl: GLContext, program: GLProgram, pname: number): number {
  const value = gl.getProgramParameter(program, pname);
  return typeof value === "number" ? value : 0;
}

function numberList(value: unknown, length: number, what: string): number[] {
  if (!Array.isArray(value) || value.length !== length) {
    throw new LinkIntrospectionError(`Driver returned no ${what} for active uniforms`);
  }
  return value.map((v) => (typeof v === "number" ? v : Number(v)));
}

function uniformUnit(gl: GLContext, program: GLProgram, name: string): number {
  const location = gl.getUniformLocation(program, name);
  if (!location) throw new LinkIntrospectionError(`Sampler '${name}' has no location`);
  const value = gl.getUniform(program, location);
  if (typeof value !== "number") {
    throw new LinkIntrospectionError(`Sampler '${name}' reported a non-numeric texture unit`);
  }
  return value;
}

function assertLinked(gl: GLContext, program: GLProgram): void {
  if (gl.getProgramParameter(program, GL.LINK_STATUS) !== true) {
    throw new LinkIntrospectionError("Program is not linked", gl.getProgramInfoLog(program) ?? "");
  }
}

function reflectAttributes(gl: GLContext, program: GLProgram): AttributeSlot[] {
  const attributes: AttributeSlot[] = [];
  const taken = new Map<number, string>();
  const count = programNumber(gl, program, GL.ACTIVE_ATTRIBUTES);

  for (let i = 0; i < count; i++) {
    const info = gl.getActiveAttrib(program, i);
    if (!info || isBuiltin(info.name)) continue;

    const name = baseName(info.name);
    const type = valueTypeFromGL(info.type);
    if (!type) {
      throw new LinkIntrospectionError(`Attribute '${name}' has unsupported type 0x${info.type.toString(16)}`);
    }
    const location = gl.getAttribLocation(program, info.name);

    // Matrices and arrays occupy one location per column / element.
    const span = VALUE_TYPES[type].columns * info.size;
    for (let l = location; l < location + span; l++) {
      const other = taken.get(l);
      if (other !== undefined) {
        throw new LinkIntrospectionError(`Attributes '${other}' and '${name}' share location ${l}`);
      }
      taken.set(l, name);
    }
    attributes.push({ name, location, type, arraySize: info.size });
  }
  return attributes.sort((a, b) => a.location - b.location);
}

function memberByteSize(
  type: ValueType, isArray: boolean, size: number, arrayStride: number, matrixStride: number, rowMajor: boolean
): number {
  if (isArray) return arrayStride * size;
  const { columns, rows } = VALUE_TYPES[type];
  if (columns > 1) return matrixStride * (rowMajor ? rows : columns);
  return 4 * rows;
}

function unqualified(name: string, blockName: string): string {
  const prefix = `${blockName}.`;
  return name.startsWith(prefix) ? name.slice(prefix.length) : name;
}

interface UniformReflection {
  readonly blocks: UniformBlockSlot[];
  readonly samplers: SamplerSlot[];
  readonly uniforms: UniformValueSlot[];
}

function reflectUniforms(gl: GLContext, program: GLProgram): UniformReflection {
  const count = programNumber(gl, program, GL.ACTIVE_UNIFORMS);
  const indices = Array.from({ length: count }, (_, i) => i);
  const blockIndices = count ? numberList(gl.getActiveUniforms(program, indices, GL.UNIFORM_BLOCK_INDEX), count, "block indices") : [];
  const offsets = count ? numberList(gl.getActiveUniforms(program, indices, GL.UNIFORM_OFFSET), count, "offsets") : [];
  const arrayStrides = count ? numberList(gl.getActiveUniforms(program, indices, GL.UNIFORM_ARRAY_STRIDE), count, "array strides") : [];
  const matrixStrides = count ? numberList(gl.getActiveUniforms(program, indices, GL.UNIFORM_MATRIX_STRIDE), count, "matrix strides") : [];
  const rowMajor = count ? numberList(gl.getActiveUniforms(program, indices, GL.UNIFORM_IS_ROW_MAJOR), count, "matrix orders") : [];

  const membersByBlock = new Map<number, { name: string; member: Omit<BlockMember, "name"> }[]>();
  const samplers: SamplerSlot[] = [];
  const uniforms: UniformValueSlot[] = [];

  for (let i = 0; i < count; i++) {
    const info = gl.getActiveUniform(program, i);
    if (!info || isBuiltin(info.name)) continue;

    const isArray = info.name.endsWith(ARRAY_SUFFIX);
    const name = baseName(info.name);

    const kind = samplerKindFromGL(info.type);
    if (kind) {
      const units = isArray
        ? Array.from({ length: info.size }, (_, k) => uniformUnit(gl, program, `${name}[${k}]`))
        : [uniformUnit(gl, program, name)];
      samplers.push({ name, kind, units, isArray });
      continue;
    }

    const type = valueTypeFromGL(info.type);
    if (!type) {
      throw new LinkIntrospectionError(`Uniform '${name}' has unsupported type 0x${info.type.toString(16)}`);
    }

    const blockIndex = blockIndices[i];
    if (blockIndex >= 0) {
      const list = membersByBlock.get(blockIndex) ?? [];
      list.push({
        name,
        member: {
          type,
          byteOffset: offsets[i],
          byteSize: memberByteSize(type, isArray, info.size, arrayStrides[i], matrixStrides[i], rowMajor[i] !== 0),
          arrayLength: isArray ? info.size : undefined,
          arrayStride: arrayStrides[i],
          matrixStride: matrixStrides[i],
          rowMajor: rowMajor[i] !== 0 ? true : undefined,
        },
      });
      membersByBlock.set(blockIndex, list);
      continue;
    }

    const location = gl.getUniformLocation(program, info.name);
    if (!location) throw new LinkIntrospectionError(`Uniform '${name}' has no location`);
    uniforms.push({ name, type, arrayLength: isArray ? info.size : undefined, location });
  }

  const blocks: UniformBlockSlot[] = [];
  const blockCount = programNumber(gl, program, GL.ACTIVE_UNIFORM_BLOCKS);
  for (let b = 0; b < blockCount; b++) {
    const name = gl.getActiveUniformBlockName(program, b);
    if (name === null) throw new LinkIntrospectionError(`Uniform block ${b} has no name`);
    const binding = gl.getActiveUniformBlockParameter(program, b, GL.UNIFORM_BLOCK_BINDING);
    const byteSize = gl.getActiveUniformBlockParameter(program, b, GL.UNIFORM_BLOCK_DATA_SIZE);
    if (typeof binding !== "number" || typeof byteSize !== "number") {
      throw new LinkIntrospectionError(`Uniform block '${name}' reported no binding or size`);
    }
    const members: BlockMember[] = (membersByBlock.get(b) ?? [])
      .map((m) => ({ name: unqualified(m.name, name), ...m.member }))
      .sort((x, y) => x.byteOffset - y.byteOffset);
    blocks.push({ name, index: b, binding, byteSize, members });
  }

  return { blocks, samplers, uniforms };
}

function assertUnique<T>(items: readonly T[], keys: (item: T) => readonly number[], what: string, name: (item: T) => string): void {
  const seen = new Map<number, string>();
  for (const item of items) {
    for (const key of keys(item)) {
      const other = seen.get(key);
      if (other !== undefined) {
        throw new LinkIntrospectionError(`'${other}' and '${name(item)}' share ${what} ${key}`);
      }
      seen.set(key, name(item));
    }
  }
}

function reflectVaryings(gl: GLContext, program: GLProgram): { varyings: VaryingSlot[]; mode: VaryingMode | null } {
  const count = programNumber(gl, program, GL.TRANSFORM_FEEDBACK_VARYINGS);
  if (count === 0) return { varyings: [], mode: null };

  const varyings: VaryingSlot[] = [];
  for (let i = 0; i < count; i++) {
    const info = gl.getTransformFeedbackVarying(program, i);
    if (!info) throw new LinkIntrospectionError(`Transform feedback varying ${i} is not queryable`);
    const type = valueTypeFromGL(info.type);
    if (!type) {
      throw new LinkIntrospectionError(`Varying '${info.name}' has unsupported type 0x${info.type.toString(16)}`);
    }
    varyings.push({ name: baseName(info.name), index: i, type, arraySize: info.size });
  }
  const mode = programNumber(gl, program, GL.TRANSFORM_FEEDBACK_BUFFER_MODE) === GL.SEPARATE_ATTRIBS
    ? "separate"
    : "interleaved";
  return { varyings, mode };
}

/**
 * Reflects a linked program into an immutable ProgramInterface. Throws
 * LinkIntrospectionError when the program is not linked, uses a type this
 * library does not model, or reuses a block binding or texture unit.
 */
export function reflectProgram(gl: GLContext, program: GLProgram): ProgramInterface {
  assertLinked(gl, program);

  const attributes = reflectAttributes(gl, program);
  const { blocks, samplers, uniforms } = reflectUniforms(gl, program);
  const { varyings, mode } = reflectVaryings(gl, program);

  assertUnique(blocks, (b) => [b.binding], "uniform block binding", (b) => b.name);
  assertUnique(samplers, (s) => s.units, "texture unit", (s) => s.name);

  return Object.freeze({
    attributes: Object.freeze(attributes),
    uniformBlocks: Object.freeze(blocks),
    samplers: Object.freeze(samplers),
    uniforms: Object.freeze(uniforms),
    varyings: Object.freeze(varyings),
    varyingMode: mode,
  });
}

/**
 * Gives every uniform block its own binding point (block i → binding i) and
 * every sampler its own texture units, in reflection order. Must run before
 * reflectProgram: freshly linked programs start with everything at 0.
 */
export function assignBindingPoints(gl: GLContext, program: GLProgram): void {
  assertLinked(gl, program);

  const blockCount = programNumber(gl, program, GL.ACTIVE_UNIFORM_BLOCKS);
  for (let b = 0; b < blockCount; b++) gl.uniformBlockBinding(program, b, b);

  const count = programNumber(gl, program, GL.ACTIVE_UNIFORMS);
  let nextUnit = 0;
  gl.useProgram(program);
  for (let i = 0; i < count; i++) {
    const info = gl.getActiveUniform(program, i);
    if (!info || samplerKindFromGL(info.type) === undefined) continue;

    const location = gl.getUniformLocation(program, info.name);
    if (!location) continue;
    if (info.size > 1) {
      const units = Int32Array.from({ length: info.size }, (_, k) => nextUnit + k);
      gl.uniform1iv(location, units);
    } else {
      gl.uniform1i(location, nextUnit);
    }
    nextUnit += info.size;
  }
  gl.useProgram(null);
}
