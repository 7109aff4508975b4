// Renderbuffer — render-only storage (usually multisampled color or depth
// attachments that are never sampled).

import type { GLContext, GLRenderbuffer } from "./GLContext";
import { GL } from "./glEnums";
import { Resource } from "./Resource";
import { TEXTURE_FORMATS, type TextureFormat } from "./Texture";

export interface RenderbufferDescriptor {
  readonly label?: string;
  readonly format: TextureFormat;
  readonly width: number;
  readonly height: number;
  /** Defaults to 1. */
  readonly samples?: number;
}

export class Renderbuffer extends Resource {
  readonly handle: GLRenderbuffer;
  readonly format: TextureFormat;
  readonly width: number;
  readonly height: number;
  readonly samples: number;

  constructor(gl: GLContext, descriptor: RenderbufferDescriptor) {
    super(gl, "renderbuffer", descriptor.label);

    this.format = descriptor.format;
    this.width = descriptor.width;
    this.height = descriptor.height;
    this.samples = descriptor.samples ?? 1;
    if (!Number.isInteger(this.samples) || this.samples < 1) {
      throw new RangeError(`Renderbuffer '${this.label}' has invalid sample count ${this.samples}`);
    }

    const renderbuffer = gl.createRenderbuffer();
    if (!renderbuffer) throw new Error("Failed to create renderbuffer");

    gl.bindRenderbuffer(GL.RENDERBUFFER, renderbuffer);
    // 0 samples selects plain (non-multisampled) storage.
    gl.renderbufferStorageMultisample(
      GL.RENDERBUFFER,
      this.samples > 1 ? this.samples : 0,
      TEXTURE_FORMATS[this.format].internalFormat,
      this.width,
      this.height
    );
    gl.bindRenderbuffer(GL.RENDERBUFFER, null);

    this.handle = renderbuffer;
  }

  protected deleteHandle(): void {
    this.gl.deleteRenderbuffer(this.handle);
  }
}
