// std140 — uniform block layouts computed under the standard packing rules,
// plus a writer that packs typed values into a block's byte image.
//
// The rules, for the value types WebGL2 exposes:
//   - scalars align to 4 bytes, vec2 to 8, vec3 and vec4 to 16 (vec3 is 12
//     bytes wide, so a following scalar can share its last slot)
//   - array elements are padded to a 16-byte stride
//   - a CxR matrix is C column vectors at a 16-byte matrix stride
//   - the block is padded to a multiple of 16
//
// These are the same numbers a driver reports through getActiveUniforms(), so
// a block built here can be compared byte for byte with a reflected one.

import {
  VALUE_TYPES,
  flattenValue,
  type UniformValue,
  type ValueType,
} from "./valueTypes";

export type FieldSpec = ValueType | { readonly type: ValueType; readonly length: number };

export type BlockFields = Readonly<Record<string, FieldSpec>>;

export interface BlockMember {
  readonly name: string;
  readonly type: ValueType;
  readonly byteOffset: number;
  readonly byteSize: number;
  readonly arrayLength?: number;
  /** 0 for members that are not arrays. */
  readonly arrayStride: number;
  /** 0 for members that are not matrices. */
  readonly matrixStride: number;
  /** Set by reflection for `row_major` matrices; std140Block lays out column-major only. */
  readonly rowMajor?: boolean;
}

export interface UniformBlockDescriptor {
  readonly name: string;
  readonly members: readonly BlockMember[];
  readonly byteSize: number;
}

export interface UniformBlockLayout<N extends string = string, F extends BlockFields = BlockFields>
  extends UniformBlockDescriptor {
  readonly name: N;
  readonly fields: F;
}

export type FieldValue<S extends FieldSpec> =
  S extends ValueType ? UniformValue<S> :
  S extends { readonly type: infer T extends ValueType } ? readonly UniformValue<T>[] | ArrayLike<number> :
  never;

const VEC4_ALIGN = 16;

function roundUp(value: number, multiple: number): number {
  return Math.ceil(value / multiple) * multiple;
}

function normalizeField(spec: FieldSpec): { type: ValueType; length?: number } {
  if (typeof spec === "string") return { type: spec };
  if (!Number.isInteger(spec.length) || spec.length < 1) {
    throw new RangeError(`Array length must be a positive integer, got ${spec.length}`);
  }
  return { type: spec.type, length: spec.length };
}

function layoutMember(name: string, spec: FieldSpec, cursor: number): BlockMember {
  const { type, length } = normalizeField(spec);
  const { columns, rows } = VALUE_TYPES[type];

  if (columns > 1) {
    const matrixStride = VEC4_ALIGN;
    const matrixSize = columns * matrixStride;
    const byteOffset = roundUp(cursor, VEC4_ALIGN);
    if (length === undefined) {
      return { name, type, byteOffset, byteSize: matrixSize, arrayStride: 0, matrixStride };
    }
    return {
      name, type, byteOffset,
      byteSize: matrixSize * length,
      arrayLength: length,
      arrayStride: matrixSize,
      matrixStride,
    };
  }

  if (length !== undefined) {
    const byteOffset = roundUp(cursor, VEC4_ALIGN);
    return {
      name, type, byteOffset,
      byteSize: VEC4_ALIGN * length,
      arrayLength: length,
      arrayStride: VEC4_ALIGN,
      matrixStride: 0,
    };
  }

  const align = rows === 1 ? 4 : rows === 2 ? 8 : VEC4_ALIGN;
  return {
    name, type,
    byteOffset: roundUp(cursor, align),
    byteSize: rows * 4,
    arrayStride: 0,
    matrixStride: 0,
  };
}

/**
 * Lays out a std140 uniform block. Field order is declaration order and must
 * mirror the block in the shader source.
 *
 *   const Globals = std140Block("Globals", { scale: "float", tint: "vec3" });
 *   // scale @ 0, tint @ 16, byteSize 32
 */
export function std140Block<N extends string, F extends BlockFields>(name: N, fields: F): UniformBlockLayout<N, F> {
  const members: BlockMember[] = [];
  let cursor = 0;
  for (const [fieldName, spec] of Object.entries(fields)) {
    const member = layoutMember(fieldName, spec, cursor);
    members.push(member);
    cursor = member.byteOffset + member.byteSize;
  }
  return Object.freeze({
    name,
    fields,
    members: Object.freeze(members),
    byteSize: roundUp(cursor, VEC4_ALIGN),
  });
}

export function describeMember(member: BlockMember): string {
  const array = member.arrayLength !== undefined ? `[${member.arrayLength}]/${member.arrayStride}` : "";
  const matrix = member.matrixStride !== 0 ? `m${member.matrixStride}${member.rowMajor ? "r" : ""}` : "";
  return `${member.name}:${member.type}${array}${matrix}@${member.byteOffset}+${member.byteSize}`;
}

/**
 * Shape of a block as a string: size plus every member's name, type, offset,
 * size and strides. The block name is left out so one buffer can feed
 * same-shaped blocks in different programs.
 */
export function blockTag(block: UniformBlockDescriptor): string {
  return `block(${block.byteSize}){${block.members.map(describeMember).join(",")}}`;
}

/**
 * Typed std140 byte image for one block layout.
 *
 *   const data = new UniformBlockData(Globals).set("scale", 2).set("tint", [1, 0, 0]);
 *   device.writeBuffer(globalsBuffer, data.bytes);
 */
export class UniformBlockData<F extends BlockFields = BlockFields> {
  readonly bytes: Uint8Array;
  private view: DataView;
  private membersByName: ReadonlyMap<string, BlockMember>;

  constructor(readonly layout: UniformBlockLayout<string, F>) {
    this.bytes = new Uint8Array(layout.byteSize);
    this.view = new DataView(this.bytes.buffer);
    this.membersByName = new Map(layout.members.map((m) => [m.name, m]));
  }

  set<K extends keyof F & string>(field: K, value: FieldValue<F[K]>): this {
    const member = this.membersByName.get(field);
    if (!member) throw new RangeError(`Block '${this.layout.name}' has no member '${field}'`);
    this.write(member, flattenValue(value));
    return this;
  }

  private write(member: BlockMember, values: number[]): void {
    const { scalar, columns, rows } = VALUE_TYPES[member.type];
    const elements = member.arrayLength ?? 1;
    const expected = elements * columns * rows;
    if (values.length !== expected) {
      throw new RangeError(
        `Member '${member.name}' (${member.type}) takes ${expected} components, got ${values.length}`
      );
    }

    let i = 0;
    for (let e = 0; e < elements; e++) {
      const elementBase = member.byteOffset + e * member.arrayStride;
      for (let c = 0; c < columns; c++) {
        const columnBase = elementBase + c * member.matrixStride;
        for (let r = 0; r < rows; r++) {
          const offset = columnBase + r * 4;
          const v = values[i++];
          if (scalar === "float") this.view.setFloat32(offset, v, true);
          else if (scalar === "int") this.view.setInt32(offset, v, true);
          else this.view.setUint32(offset, v, true);
        }
      }
    }
  }
}
