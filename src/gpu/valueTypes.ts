// GLSL value and sampler types, keyed by their GLSL names, with the GL enum
// each one is reported as during reflection.

import type {
  ReadonlyMat2,
  ReadonlyMat3,
  ReadonlyMat4,
  ReadonlyVec2,
  ReadonlyVec3,
  ReadonlyVec4,
} from "gl-matrix";
import { GL } from "./glEnums";

export type ScalarType = "float" | "int" | "uint" | "bool";

export type ValueType =
  | "float" | "vec2" | "vec3" | "vec4"
  | "int" | "ivec2" | "ivec3" | "ivec4"
  | "uint" | "uvec2" | "uvec3" | "uvec4"
  | "bool" | "bvec2" | "bvec3" | "bvec4"
  | "mat2" | "mat3" | "mat4"
  | "mat2x3" | "mat2x4" | "mat3x2" | "mat3x4" | "mat4x2" | "mat4x3";

export interface ValueTypeInfo {
  readonly glType: number;
  readonly scalar: ScalarType;
  /** Column count; 1 for scalars and vectors. */
  readonly columns: number;
  /** Components per column. */
  readonly rows: number;
}

export const VALUE_TYPES: Readonly<Record<ValueType, ValueTypeInfo>> = {
  float: { glType: GL.FLOAT, scalar: "float", columns: 1, rows: 1 },
  vec2: { glType: GL.FLOAT_VEC2, scalar: "float", columns: 1, rows: 2 },
  vec3: { glType: GL.FLOAT_VEC3, scalar: "float", columns: 1, rows: 3 },
  vec4: { glType: GL.FLOAT_VEC4, scalar: "float", columns: 1, rows: 4 },
  int: { glType: GL.INT, scalar: "int", columns: 1, rows: 1 },
  ivec2: { glType: GL.INT_VEC2, scalar: "int", columns: 1, rows: 2 },
  ivec3: { glType: GL.INT_VEC3, scalar: "int", columns: 1, rows: 3 },
  ivec4: { glType: GL.INT_VEC4, scalar: "int", columns: 1, rows: 4 },
  uint: { glType: GL.UNSIGNED_INT, scalar: "uint", columns: 1, rows: 1 },
  uvec2: { glType: GL.UNSIGNED_INT_VEC2, scalar: "uint", columns: 1, rows: 2 },
  uvec3: { glType: GL.UNSIGNED_INT_VEC3, scalar: "uint", columns: 1, rows: 3 },
  uvec4: { glType: GL.UNSIGNED_INT_VEC4, scalar: "uint", columns: 1, rows: 4 },
  bool: { glType: GL.BOOL, scalar: "bool", columns: 1, rows: 1 },
  bvec2: { glType: GL.BOOL_VEC2, scalar: "bool", columns: 1, rows: 2 },
  bvec3: { glType: GL.BOOL_VEC3, scalar: "bool", columns: 1, rows: 3 },
  bvec4: { glType: GL.BOOL_VEC4, scalar: "bool", columns: 1, rows: 4 },
  mat2: { glType: GL.FLOAT_MAT2, scalar: "float", columns: 2, rows: 2 },
  mat3: { glType: GL.FLOAT_MAT3, scalar: "float", columns: 3, rows: 3 },
  mat4: { glType: GL.FLOAT_MAT4, scalar: "float", columns: 4, rows: 4 },
  mat2x3: { glType: GL.FLOAT_MAT2x3, scalar: "float", columns: 2, rows: 3 },
  mat2x4: { glType: GL.FLOAT_MAT2x4, scalar: "float", columns: 2, rows: 4 },
  mat3x2: { glType: GL.FLOAT_MAT3x2, scalar: "float", columns: 3, rows: 2 },
  mat3x4: { glType: GL.FLOAT_MAT3x4, scalar: "float", columns: 3, rows: 4 },
  mat4x2: { glType: GL.FLOAT_MAT4x2, scalar: "float", columns: 4, rows: 2 },
  mat4x3: { glType: GL.FLOAT_MAT4x3, scalar: "float", columns: 4, rows: 3 },
};

export type TextureDimension = "2d" | "3d" | "2d-array" | "cube";

/** What a sampler reads: filtered floats, raw integers, or depth comparisons. */
export type SampleType = "float" | "int" | "uint" | "depth";

export type SamplerKind =
  | "sampler2D" | "sampler3D" | "samplerCube" | "sampler2DArray"
  | "sampler2DShadow" | "samplerCubeShadow" | "sampler2DArrayShadow"
  | "isampler2D" | "isampler3D" | "isamplerCube" | "isampler2DArray"
  | "usampler2D" | "usampler3D" | "usamplerCube" | "usampler2DArray";

export interface SamplerKindInfo {
  readonly glType: number;
  readonly dimension: TextureDimension;
  readonly sampleType: SampleType;
}

export const SAMPLER_KINDS: Readonly<Record<SamplerKind, SamplerKindInfo>> = {
  sampler2D: { glType: GL.SAMPLER_2D, dimension: "2d", sampleType: "float" },
  sampler3D: { glType: GL.SAMPLER_3D, dimension: "3d", sampleType: "float" },
  samplerCube: { glType: GL.SAMPLER_CUBE, dimension: "cube", sampleType: "float" },
  sampler2DArray: { glType: GL.SAMPLER_2D_ARRAY, dimension: "2d-array", sampleType: "float" },
  sampler2DShadow: { glType: GL.SAMPLER_2D_SHADOW, dimension: "2d", sampleType: "depth" },
  samplerCubeShadow: { glType: GL.SAMPLER_CUBE_SHADOW, dimension: "cube", sampleType: "depth" },
  sampler2DArrayShadow: { glType: GL.SAMPLER_2D_ARRAY_SHADOW, dimension: "2d-array", sampleType: "depth" },
  isampler2D: { glType: GL.INT_SAMPLER_2D, dimension: "2d", sampleType: "int" },
  isampler3D: { glType: GL.INT_SAMPLER_3D, dimension: "3d", sampleType: "int" },
  isamplerCube: { glType: GL.INT_SAMPLER_CUBE, dimension: "cube", sampleType: "int" },
  isampler2DArray: { glType: GL.INT_SAMPLER_2D_ARRAY, dimension: "2d-array", sampleType: "int" },
  usampler2D: { glType: GL.UNSIGNED_INT_SAMPLER_2D, dimension: "2d", sampleType: "uint" },
  usampler3D: { glType: GL.UNSIGNED_INT_SAMPLER_3D, dimension: "3d", sampleType: "uint" },
  usamplerCube: { glType: GL.UNSIGNED_INT_SAMPLER_CUBE, dimension: "cube", sampleType: "uint" },
  usampler2DArray: { glType: GL.UNSIGNED_INT_SAMPLER_2D_ARRAY, dimension: "2d-array", sampleType: "uint" },
};

const valueTypesByEnum = new Map<number, ValueType>();
for (const [name, info] of Object.entries(VALUE_TYPES)) {
  if (isValueType(name)) valueTypesByEnum.set(info.glType, name);
}

const samplerKindsByEnum = new Map<number, SamplerKind>();
for (const [name, info] of Object.entries(SAMPLER_KINDS)) {
  if (isSamplerKind(name)) samplerKindsByEnum.set(info.glType, name);
}

export function isValueType(name: string): name is ValueType {
  return Object.prototype.hasOwnProperty.call(VALUE_TYPES, name);
}

export function isSamplerKind(name: string): name is SamplerKind {
  return Object.prototype.hasOwnProperty.call(SAMPLER_KINDS, name);
}

export function valueTypeFromGL(glType: number): ValueType | undefined {
  return valueTypesByEnum.get(glType);
}

export function samplerKindFromGL(glType: number): SamplerKind | undefined {
  return samplerKindsByEnum.get(glType);
}

export function componentCount(type: ValueType): number {
  const info = VALUE_TYPES[type];
  return info.columns * info.rows;
}

/** Tag of a texture as seen by samplers: "<dimension>:<sampleType>". */
export function textureTag(dimension: TextureDimension, sampleType: SampleType): string {
  return `${dimension}:${sampleType}`;
}

/**
 * Texture tags a sampler kind accepts. Float samplers also read depth
 * textures (without comparison); shadow samplers read only depth textures.
 */
export function acceptedTextureTags(kind: SamplerKind): ReadonlySet<string> {
  const { dimension, sampleType } = SAMPLER_KINDS[kind];
  if (sampleType === "float") {
    return new Set([textureTag(dimension, "float"), textureTag(dimension, "depth")]);
  }
  return new Set([textureTag(dimension, sampleType)]);
}

/** Any typed array; DataView is a view too but has no elements. */
function isTypedArray(value: unknown): value is ArrayLike<unknown> {
  return ArrayBuffer.isView(value) && !(value instanceof DataView);
}

/**
 * Flattens a host value (number, boolean, gl-matrix vector or matrix, typed
 * array, or an array of any of these) into its components in order.
 * Booleans become 0/1.
 */
export function flattenValue(value: unknown, out: number[] = []): number[] {
  if (typeof value === "number") {
    out.push(value);
  } else if (typeof value === "boolean") {
    out.push(value ? 1 : 0);
  } else if (Array.isArray(value) || isTypedArray(value)) {
    for (let i = 0; i < value.length; i++) flattenValue(value[i], out);
  } else {
    throw new TypeError(`Cannot use ${typeof value} as a uniform value`);
  }
  return out;
}

/** Any host value flattenValue understands. */
export type UniformInput = number | boolean | ArrayLike<number> | readonly (number | boolean | ArrayLike<number>)[];

// Host-side value accepted for each GLSL type. Vectors and matrices take any
// gl-matrix value (or plain arrays), column-major.
export type UniformValue<T extends ValueType> =
  T extends "float" | "int" | "uint" ? number :
  T extends "bool" ? boolean :
  T extends "vec2" ? ReadonlyVec2 :
  T extends "vec3" ? ReadonlyVec3 :
  T extends "vec4" ? ReadonlyVec4 :
  T extends "mat2" ? ReadonlyMat2 :
  T extends "mat3" ? ReadonlyMat3 :
  T extends "mat4" ? ReadonlyMat4 :
  ArrayLike<number>;
