// Sampler — a GL sampler object. Overrides the filtering and wrapping of
// whatever texture it is paired with; shadow sampler slots need one with a
// `compare` function set.

import type { GLContext, GLSampler } from "./GLContext";
import { GL } from "./glEnums";
import type { CompareFunction } from "./PipelineBuilder";
import { Resource } from "./Resource";
import type { TextureFilter } from "./Texture";

export type WrapMode = "repeat" | "clamp-to-edge" | "mirrored-repeat";

export interface SamplerOptions {
  readonly label?: string;
  readonly minFilter?: TextureFilter;
  readonly magFilter?: TextureFilter;
  /** Filter between mip levels; "none" samples level 0 only. */
  readonly mipmapFilter?: "none" | TextureFilter;
  readonly wrapS?: WrapMode;
  readonly wrapT?: WrapMode;
  readonly wrapR?: WrapMode;
  /** Depth comparison for shadow samplers. */
  readonly compare?: CompareFunction;
}

const WRAP_MODES: Record<WrapMode, number> = {
  repeat: GL.REPEAT,
  "clamp-to-edge": GL.CLAMP_TO_EDGE,
  "mirrored-repeat": GL.MIRRORED_REPEAT,
};

export const COMPARE_FUNCTIONS: Readonly<Record<CompareFunction, number>> = {
  never: GL.NEVER,
  less: GL.LESS,
  equal: GL.EQUAL,
  "less-equal": GL.LEQUAL,
  greater: GL.GREATER,
  "not-equal": GL.NOTEQUAL,
  "greater-equal": GL.GEQUAL,
  always: GL.ALWAYS,
};

function minFilterEnum(min: TextureFilter, mip: "none" | TextureFilter): number {
  if (mip === "none") return min === "linear" ? GL.LINEAR : GL.NEAREST;
  if (min === "linear") return mip === "linear" ? GL.LINEAR_MIPMAP_LINEAR : GL.LINEAR_MIPMAP_NEAREST;
  return mip === "linear" ? GL.NEAREST_MIPMAP_LINEAR : GL.NEAREST_MIPMAP_NEAREST;
}

export class Sampler extends Resource {
  readonly handle: GLSampler;
  readonly compare: CompareFunction | null;

  constructor(gl: GLContext, options: SamplerOptions = {}) {
    super(gl, "sampler", options.label);

    const sampler = gl.createSampler();
    if (!sampler) throw new Error("Failed to create sampler");

    const min = minFilterEnum(options.minFilter ?? "nearest", options.mipmapFilter ?? "none");
    gl.samplerParameteri(sampler, GL.TEXTURE_MIN_FILTER, min);
    gl.samplerParameteri(sampler, GL.TEXTURE_MAG_FILTER, options.magFilter === "linear" ? GL.LINEAR : GL.NEAREST);
    gl.samplerParameteri(sampler, GL.TEXTURE_WRAP_S, WRAP_MODES[options.wrapS ?? "clamp-to-edge"]);
    gl.samplerParameteri(sampler, GL.TEXTURE_WRAP_T, WRAP_MODES[options.wrapT ?? "clamp-to-edge"]);
    gl.samplerParameteri(sampler, GL.TEXTURE_WRAP_R, WRAP_MODES[options.wrapR ?? "clamp-to-edge"]);
    if (options.compare) {
      gl.samplerParameteri(sampler, GL.TEXTURE_COMPARE_MODE, GL.COMPARE_REF_TO_TEXTURE);
      gl.samplerParameteri(sampler, GL.TEXTURE_COMPARE_FUNC, COMPARE_FUNCTIONS[options.compare]);
    }

    this.handle = sampler;
    this.compare = options.compare ?? null;
  }

  protected deleteHandle(): void {
    this.gl.deleteSampler(this.handle);
  }
}
