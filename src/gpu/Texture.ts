// Texture — wraps a WebGL texture object with immutable storage.
//
// Samplers see a texture through its tag, "<dimension>:<sampleType>" (for
// example "2d:float" or "cube:depth"); a sampler slot accepts the tags its
// GLSL sampler type can read. Filtering set here applies when the texture is
// bound without a Sampler; `sampledWith` pairs it with one.

import type { GLContext, GLTexture } from "./GLContext";
import { GL } from "./glEnums";
import { Resource } from "./Resource";
import type { Sampler } from "./Sampler";
import { textureTag, type SampleType, type TextureDimension } from "./valueTypes";

export interface TextureFormatInfo {
  readonly internalFormat: number;
  readonly format: number;
  readonly type: number;
  readonly bytesPerTexel: number;
  readonly sampleType: SampleType;
  readonly hasStencil: boolean;
}

export const TEXTURE_FORMATS = {
  r8: { internalFormat: GL.R8, format: GL.RED, type: GL.UNSIGNED_BYTE, bytesPerTexel: 1, sampleType: "float", hasStencil: false },
  rg8: { internalFormat: GL.RG8, format: GL.RG, type: GL.UNSIGNED_BYTE, bytesPerTexel: 2, sampleType: "float", hasStencil: false },
  rgba8: { internalFormat: GL.RGBA8, format: GL.RGBA, type: GL.UNSIGNED_BYTE, bytesPerTexel: 4, sampleType: "float", hasStencil: false },
  "srgb8-alpha8": { internalFormat: GL.SRGB8_ALPHA8, format: GL.RGBA, type: GL.UNSIGNED_BYTE, bytesPerTexel: 4, sampleType: "float", hasStencil: false },
  r32f: { internalFormat: GL.R32F, format: GL.RED, type: GL.FLOAT, bytesPerTexel: 4, sampleType: "float", hasStencil: false },
  rgba16f: { internalFormat: GL.RGBA16F, format: GL.RGBA, type: GL.HALF_FLOAT, bytesPerTexel: 8, sampleType: "float", hasStencil: false },
  rgba32f: { internalFormat: GL.RGBA32F, format: GL.RGBA, type: GL.FLOAT, bytesPerTexel: 16, sampleType: "float", hasStencil: false },
  r32i: { internalFormat: GL.R32I, format: GL.RED_INTEGER, type: GL.INT, bytesPerTexel: 4, sampleType: "int", hasStencil: false },
  r32ui: { internalFormat: GL.R32UI, format: GL.RED_INTEGER, type: GL.UNSIGNED_INT, bytesPerTexel: 4, sampleType: "uint", hasStencil: false },
  rgba8ui: { internalFormat: GL.RGBA8UI, format: GL.RGBA_INTEGER, type: GL.UNSIGNED_BYTE, bytesPerTexel: 4, sampleType: "uint", hasStencil: false },
  depth16: { internalFormat: GL.DEPTH_COMPONENT16, format: GL.DEPTH_COMPONENT, type: GL.UNSIGNED_SHORT, bytesPerTexel: 2, sampleType: "depth", hasStencil: false },
  depth24: { internalFormat: GL.DEPTH_COMPONENT24, format: GL.DEPTH_COMPONENT, type: GL.UNSIGNED_INT, bytesPerTexel: 4, sampleType: "depth", hasStencil: false },
  depth32f: { internalFormat: GL.DEPTH_COMPONENT32F, format: GL.DEPTH_COMPONENT, type: GL.FLOAT, bytesPerTexel: 4, sampleType: "depth", hasStencil: false },
  "depth24-stencil8": { internalFormat: GL.DEPTH24_STENCIL8, format: GL.DEPTH_STENCIL, type: GL.UNSIGNED_INT_24_8, bytesPerTexel: 4, sampleType: "depth", hasStencil: true },
} as const satisfies Record<string, TextureFormatInfo>;

export type TextureFormat = keyof typeof TEXTURE_FORMATS;

export function isDepthFormat(format: TextureFormat): boolean {
  return TEXTURE_FORMATS[format].sampleType === "depth";
}

/**
 * Format and type readPixels returns for a color format: normalized formats
 * read back as RGBA bytes, float formats as RGBA floats, integer formats as
 * RGBA 32-bit integers.
 */
export function readbackFormat(format: TextureFormat): { format: number; type: number; bytesPerPixel: number } {
  const info: TextureFormatInfo = TEXTURE_FORMATS[format];
  switch (info.sampleType) {
    case "depth":
      throw new RangeError(`Depth format '${format}' cannot be read back`);
    case "int":
      return { format: GL.RGBA_INTEGER, type: GL.INT, bytesPerPixel: 16 };
    case "uint":
      return { format: GL.RGBA_INTEGER, type: GL.UNSIGNED_INT, bytesPerPixel: 16 };
    case "float":
      return info.type === GL.UNSIGNED_BYTE
        ? { format: GL.RGBA, type: GL.UNSIGNED_BYTE, bytesPerPixel: 4 }
        : { format: GL.RGBA, type: GL.FLOAT, bytesPerPixel: 16 };
  }
}

const TARGETS: Record<TextureDimension, number> = {
  "2d": GL.TEXTURE_2D,
  "3d": GL.TEXTURE_3D,
  "2d-array": GL.TEXTURE_2D_ARRAY,
  cube: GL.TEXTURE_CUBE_MAP,
};

export type TextureFilter = "nearest" | "linear";

export interface TextureDescriptor {
  readonly label?: string;
  readonly format: TextureFormat;
  readonly width: number;
  readonly height: number;
  /** Defaults to "2d". */
  readonly dimension?: TextureDimension;
  /** Depth of a 3d texture or layer count of a 2d-array texture. */
  readonly depthOrLayers?: number;
  /** Mip levels; defaults to 1. */
  readonly levels?: number;
  /** default: nearest */
  readonly filter?: TextureFilter;
}

export interface TextureRegion {
  readonly level?: number;
  readonly x?: number;
  readonly y?: number;
  /** Slice of a 3d texture, layer of an array texture, or face (0-5) of a cube. */
  readonly z?: number;
  readonly width?: number;
  readonly height?: number;
  readonly depth?: number;
}

export class Texture extends Resource {
  readonly handle: GLTexture;
  readonly format: TextureFormat;
  readonly dimension: TextureDimension;
  readonly width: number;
  readonly height: number;
  readonly depthOrLayers: number;
  readonly levels: number;
  readonly layoutTag: string;

  constructor(gl: GLContext, descriptor: TextureDescriptor) {
    super(gl, "texture", descriptor.label);

    this.format = descriptor.format;
    this.dimension = descriptor.dimension ?? "2d";
    this.width = descriptor.width;
    this.height = descriptor.height;
    this.depthOrLayers = this.dimension === "cube" ? 6 : descriptor.depthOrLayers ?? 1;
    this.levels = descriptor.levels ?? 1;
    this.layoutTag = textureTag(this.dimension, TEXTURE_FORMATS[this.format].sampleType);

    if (this.width < 1 || this.height < 1 || this.depthOrLayers < 1 || this.levels < 1) {
      throw new RangeError(`Texture '${this.label}' has an empty extent`);
    }

    const texture = gl.createTexture();
    if (!texture) throw new Error("Failed to create texture");

    const target = TARGETS[this.dimension];
    const { internalFormat } = TEXTURE_FORMATS[this.format];
    gl.bindTexture(target, texture);
    if (this.dimension === "3d" || this.dimension === "2d-array") {
      gl.texStorage3D(target, this.levels, internalFormat, this.width, this.height, this.depthOrLayers);
    } else {
      gl.texStorage2D(target, this.levels, internalFormat, this.width, this.height);
    }

    const filter = descriptor.filter === "linear" ? GL.LINEAR : GL.NEAREST;
    gl.texParameteri(target, GL.TEXTURE_MIN_FILTER, filter);
    gl.texParameteri(target, GL.TEXTURE_MAG_FILTER, filter);
    gl.bindTexture(target, null);

    this.handle = texture;
  }

  get target(): number {
    return TARGETS[this.dimension];
  }

  /** Uploads texels into a region (the whole level 0 image by default). */
  write(data: ArrayBufferView, region: TextureRegion = {}): void {
    if (this.destroyed) throw new Error(`Texture '${this.label}' has been destroyed`);

    const level = region.level ?? 0;
    const x = region.x ?? 0;
    const y = region.y ?? 0;
    const z = region.z ?? 0;
    const width = region.width ?? Math.max(1, this.width >> level);
    const height = region.height ?? Math.max(1, this.height >> level);
    const depth = region.depth ?? 1;

    const info = TEXTURE_FORMATS[this.format];
    const expected = width * height * depth * info.bytesPerTexel;
    if (data.byteLength < expected) {
      throw new RangeError(`Texture '${this.label}' write needs ${expected} bytes, got ${data.byteLength}`);
    }

    const gl = this.gl;
    gl.bindTexture(this.target, this.handle);
    if (this.dimension === "3d" || this.dimension === "2d-array") {
      gl.texSubImage3D(this.target, level, x, y, z, width, height, depth, info.format, info.type, data);
    } else {
      const faceTarget = this.dimension === "cube" ? GL.TEXTURE_CUBE_MAP_POSITIVE_X + z : this.target;
      gl.texSubImage2D(faceTarget, level, x, y, width, height, info.format, info.type, data);
    }
    gl.bindTexture(this.target, null);
  }

  sampledWith(sampler: Sampler): SampledTexture {
    return new SampledTexture(this, sampler);
  }

  protected deleteHandle(): void {
    this.gl.deleteTexture(this.handle);
  }
}

/** A texture read through an explicit sampler object. */
export class SampledTexture {
  readonly layoutTag: string;

  constructor(readonly texture: Texture, readonly sampler: Sampler) {
    this.layoutTag = texture.layoutTag;
  }

  get label(): string {
    return `${this.texture.label}+${this.sampler.label}`;
  }
}
