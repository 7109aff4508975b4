// Buffer — a GL buffer tagged with the layout of what it holds.
//
// The layout tag is fixed at creation: vertex buffers carry their vertex
// layout, uniform buffers their block shape, index buffers their index type.
// Binding compares this tag against the pipeline's contract, nothing more.

import type { GLBuffer, GLContext } from "./GLContext";
import { GL } from "./glEnums";
import { Resource } from "./Resource";
import { blockTag, type UniformBlockDescriptor } from "./std140";
import { vertexLayoutTag, type VertexBufferLayout } from "./VertexLayout";

export type BufferUsage = "vertex" | "index" | "uniform";

export type IndexFormat = "uint16" | "uint32";

interface BufferDescriptorBase {
  readonly label?: string;
  /** Initial contents. */
  readonly data?: ArrayBufferView;
  /** Allocation size when no data is given (or larger than the data). */
  readonly byteLength?: number;
}

export interface VertexBufferDescriptor extends BufferDescriptorBase {
  readonly usage: "vertex";
  readonly layout: VertexBufferLayout;
  /** Allow the buffer to receive transform feedback output. */
  readonly capture?: boolean;
}

export interface IndexBufferDescriptor extends BufferDescriptorBase {
  readonly usage: "index";
  readonly format: IndexFormat;
}

export interface UniformBufferDescriptor extends BufferDescriptorBase {
  readonly usage: "uniform";
  readonly layout: UniformBlockDescriptor;
}

export type BufferDescriptor = VertexBufferDescriptor | IndexBufferDescriptor | UniformBufferDescriptor;

const INDEX_BYTES: Record<IndexFormat, number> = { uint16: 2, uint32: 4 };

const TARGETS: Record<BufferUsage, number> = {
  vertex: GL.ARRAY_BUFFER,
  index: GL.ELEMENT_ARRAY_BUFFER,
  uniform: GL.UNIFORM_BUFFER,
};

function layoutTagFor(descriptor: BufferDescriptor): string {
  switch (descriptor.usage) {
    case "vertex":
      return vertexLayoutTag(descriptor.layout);
    case "uniform":
      return blockTag(descriptor.layout);
    case "index":
      return `index:${descriptor.format}`;
  }
}

function allocationSize(descriptor: BufferDescriptor): number {
  const requested = Math.max(descriptor.data?.byteLength ?? 0, descriptor.byteLength ?? 0);
  // A uniform buffer always covers the whole block, even if the data given
  // only fills its leading members.
  const size = descriptor.usage === "uniform" ? Math.max(requested, descriptor.layout.byteSize) : requested;
  if (size <= 0) throw new RangeError("Buffer needs data or a positive byteLength");
  return size;
}

export class Buffer extends Resource {
  readonly handle: GLBuffer;
  readonly usage: BufferUsage;
  readonly layoutTag: string;
  readonly byteLength: number;
  readonly capture: boolean;
  readonly indexFormat: IndexFormat | null;

  constructor(gl: GLContext, descriptor: BufferDescriptor) {
    super(gl, `${descriptor.usage}-buffer`, descriptor.label);

    const handle = gl.createBuffer();
    if (!handle) throw new Error("Failed to create buffer");

    this.handle = handle;
    this.usage = descriptor.usage;
    this.layoutTag = layoutTagFor(descriptor);
    this.byteLength = allocationSize(descriptor);
    this.capture = descriptor.usage === "vertex" && descriptor.capture === true;
    this.indexFormat = descriptor.usage === "index" ? descriptor.format : null;

    if (this.indexFormat && this.byteLength % INDEX_BYTES[this.indexFormat] !== 0) {
      gl.deleteBuffer(handle);
      throw new RangeError(`Index buffer size ${this.byteLength} is not a multiple of ${this.indexFormat}`);
    }

    const target = TARGETS[this.usage];
    const hint = this.capture ? GL.DYNAMIC_COPY : this.usage === "uniform" ? GL.DYNAMIC_DRAW : GL.STATIC_DRAW;
    gl.bindBuffer(target, handle);
    const data = descriptor.data;
    if (data && data.byteLength === this.byteLength) {
      gl.bufferData(target, data, hint);
    } else {
      gl.bufferData(target, this.byteLength, hint);
      if (data) gl.bufferSubData(target, 0, data);
    }
    gl.bindBuffer(target, null);
  }

  /** Bytes per index, or 0 for non-index buffers. */
  get bytesPerIndex(): number {
    return this.indexFormat ? INDEX_BYTES[this.indexFormat] : 0;
  }

  get indexCount(): number {
    return this.indexFormat ? this.byteLength / INDEX_BYTES[this.indexFormat] : 0;
  }

  get target(): number {
    return TARGETS[this.usage];
  }

  write(data: ArrayBufferView, byteOffset = 0): void {
    if (this.destroyed) throw new Error(`Buffer '${this.label}' has been destroyed`);
    if (byteOffset < 0 || byteOffset + data.byteLength > this.byteLength) {
      throw new RangeError(
        `Write of ${data.byteLength} bytes at ${byteOffset} overruns buffer '${this.label}' (${this.byteLength} bytes)`
      );
    }
    this.gl.bindBuffer(this.target, this.handle);
    this.gl.bufferSubData(this.target, byteOffset, data);
    this.gl.bindBuffer(this.target, null);
  }

  protected deleteHandle(): void {
    this.gl.deleteBuffer(this.handle);
  }
}
