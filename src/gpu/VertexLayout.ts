// VertexLayout — describes how attributes are laid out in one vertex buffer.
// You list the attributes once; offsets and stride are computed from their
// formats, and the same layout later configures the attribute pointers.
//
//   const quad = vertexBuffer("vertices", [
//     { name: "position", format: "float32x2" },
//     { name: "uv", format: "unorm16x2" },
//   ]);
//   // position @ 0, uv @ 8, arrayStride 12
//
// An attribute that spans several locations (a mat4 per instance, or an
// attribute array) sets `span`; each extra location follows at the next
// multiple of the format size.

import { GL } from "./glEnums";
import type { ScalarType } from "./valueTypes";

type Signedness = "sint" | "uint" | "snorm" | "unorm";

export type VertexFormat =
  | `float32x${1 | 2 | 3 | 4}`
  | `${"sint32" | "uint32"}x${1 | 2 | 3 | 4}`
  | `${Signedness}${8 | 16}x${2 | 4}`
  | `float16x${2 | 4}`;

export interface VertexFormatInfo {
  readonly componentType: number;
  readonly components: number;
  readonly byteSize: number;
  readonly normalized: boolean;
  /** Base type the shader sees the attribute as. */
  readonly shaderScalar: ScalarType;
}

const COMPONENT_TYPES: Record<Signedness, Record<8 | 16, number>> = {
  sint: { 8: GL.BYTE, 16: GL.SHORT },
  snorm: { 8: GL.BYTE, 16: GL.SHORT },
  uint: { 8: GL.UNSIGNED_BYTE, 16: GL.UNSIGNED_SHORT },
  unorm: { 8: GL.UNSIGNED_BYTE, 16: GL.UNSIGNED_SHORT },
};

function buildFormatTable(): ReadonlyMap<string, VertexFormatInfo> {
  const table = new Map<string, VertexFormatInfo>();
  for (const n of [1, 2, 3, 4]) {
    table.set(`float32x${n}`, {
      componentType: GL.FLOAT, components: n, byteSize: 4 * n, normalized: false, shaderScalar: "float",
    });
    table.set(`sint32x${n}`, {
      componentType: GL.INT, components: n, byteSize: 4 * n, normalized: false, shaderScalar: "int",
    });
    table.set(`uint32x${n}`, {
      componentType: GL.UNSIGNED_INT, components: n, byteSize: 4 * n, normalized: false, shaderScalar: "uint",
    });
  }
  for (const n of [2, 4]) {
    for (const bits of [8, 16] as const) {
      for (const sign of ["sint", "uint", "snorm", "unorm"] as const) {
        const normalized = sign === "snorm" || sign === "unorm";
        table.set(`${sign}${bits}x${n}`, {
          componentType: COMPONENT_TYPES[sign][bits],
          components: n,
          byteSize: (bits / 8) * n,
          normalized,
          shaderScalar: normalized ? "float" : sign === "sint" ? "int" : "uint",
        });
      }
    }
    table.set(`float16x${n}`, {
      componentType: GL.HALF_FLOAT, components: n, byteSize: 2 * n, normalized: false, shaderScalar: "float",
    });
  }
  return table;
}

const VERTEX_FORMATS = buildFormatTable();

export function vertexFormatInfo(format: VertexFormat): VertexFormatInfo {
  const info = VERTEX_FORMATS.get(format);
  if (!info) throw new RangeError(`Unknown vertex format '${format}'`);
  return info;
}

export type StepMode = "vertex" | "instance";

export interface VertexAttributeDescriptor {
  readonly name: string;
  readonly format: VertexFormat;
  /** Expected shader location; checked against reflection when given. */
  readonly location?: number;
  /** Byte offset within a vertex; packed after the previous attribute when omitted. */
  readonly offset?: number;
  /** Consecutive locations the attribute occupies (matrix columns, array elements). */
  readonly span?: number;
}

export interface VertexAttributeLayout {
  readonly name: string;
  readonly format: VertexFormat;
  readonly location?: number;
  readonly byteOffset: number;
  readonly span: number;
}

export interface VertexBufferLayout<N extends string = string> {
  readonly name: N;
  readonly stepMode: StepMode;
  readonly arrayStride: number;
  readonly attributes: readonly VertexAttributeLayout[];
}

export interface VertexBufferOptions {
  readonly stepMode?: StepMode;
  readonly arrayStride?: number;
}

function alignTo(value: number, multiple: number): number {
  return Math.ceil(value / multiple) * multiple;
}

function componentSize(info: VertexFormatInfo): number {
  return info.byteSize / info.components;
}

export function vertexBuffer<N extends string>(
  name: N,
  attributes: readonly VertexAttributeDescriptor[],
  options: VertexBufferOptions = {}
): VertexBufferLayout<N> {
  const layouts: VertexAttributeLayout[] = [];
  let end = 0;

  for (const attr of attributes) {
    const info = vertexFormatInfo(attr.format);
    const span = attr.span ?? 1;
    if (!Number.isInteger(span) || span < 1) {
      throw new RangeError(`Attribute '${attr.name}' has invalid span ${span}`);
    }
    const byteOffset = attr.offset ?? alignTo(end, componentSize(info));
    if (byteOffset % componentSize(info) !== 0) {
      throw new RangeError(`Attribute '${attr.name}' offset ${byteOffset} is not aligned to its component size`);
    }
    layouts.push({ name: attr.name, format: attr.format, location: attr.location, byteOffset, span });
    end = Math.max(end, byteOffset + info.byteSize * span);
  }

  const arrayStride = options.arrayStride ?? alignTo(end, 4);
  if (arrayStride < end) {
    throw new RangeError(`Vertex buffer '${name}' stride ${arrayStride} is smaller than its attributes (${end} bytes)`);
  }

  return Object.freeze({
    name,
    stepMode: options.stepMode ?? "vertex",
    arrayStride,
    attributes: Object.freeze(layouts),
  });
}

/**
 * Byte shape of a vertex buffer: stride plus each attribute's format, offset
 * and span. Names, locations and step mode belong to the pipeline, not to the
 * buffer contents, and are left out.
 */
export function vertexLayoutTag(layout: VertexBufferLayout): string {
  const attrs = layout.attributes.map(
    (a) => `${a.format}@${a.byteOffset}${a.span > 1 ? `x${a.span}` : ""}`
  );
  return `vertex(${layout.arrayStride}){${attrs.join(",")}}`;
}
