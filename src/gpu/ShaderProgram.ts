// ShaderProgram — compiles vertex + fragment GLSL, links them, and exposes the
// reflected ProgramInterface the pipeline builder checks descriptors against.
//
// Binding points are pinned right after linking (uniform block i → binding i,
// samplers on sequential texture units), so the interface a pipeline is built
// from is also the one every draw runs with. Reflection happens lazily on the
// first `interface` access and is cached for the program's lifetime.

import { LinkIntrospectionError } from "./errors";
import type { GLContext, GLProgram, GLShader } from "./GLContext";
import { GL } from "./glEnums";
import { log } from "./log";
import {
  assignBindingPoints,
  reflectProgram,
  type ProgramInterface,
  type VaryingMode,
} from "./ProgramReflection";

export interface TransformFeedbackVaryings {
  readonly varyings: readonly string[];
  readonly mode: VaryingMode;
}

export interface ShaderProgramOptions {
  readonly label?: string;
  /** Varyings to capture; must be declared before linking. */
  readonly transformFeedback?: TransformFeedbackVaryings;
}

let nextProgramId = 0;

export class ShaderProgram {
  readonly label: string;
  private reflected: ProgramInterface | null = null;
  private _destroyed = false;

  private constructor(
    private gl: GLContext,
    readonly handle: GLProgram,
    label: string | undefined
  ) {
    this.label = label ?? `program#${nextProgramId++}`;
    assignBindingPoints(gl, handle);
  }

  static compile(
    gl: GLContext,
    vertexSource: string,
    fragmentSource: string,
    options: ShaderProgramOptions = {}
  ): ShaderProgram {
    const vs = compileShader(gl, GL.VERTEX_SHADER, vertexSource);
    const fs = compileShader(gl, GL.FRAGMENT_SHADER, fragmentSource);

    const program = gl.createProgram();
    if (!program) throw new Error("Failed to create program");

    gl.attachShader(program, vs);
    gl.attachShader(program, fs);
    if (options.transformFeedback) {
      const { varyings, mode } = options.transformFeedback;
      gl.transformFeedbackVaryings(
        program,
        [...varyings],
        mode === "separate" ? GL.SEPARATE_ATTRIBS : GL.INTERLEAVED_ATTRIBS
      );
    }
    gl.linkProgram(program);

    gl.deleteShader(vs);
    gl.deleteShader(fs);

    if (gl.getProgramParameter(program, GL.LINK_STATUS) !== true) {
      const infoLog = gl.getProgramInfoLog(program) ?? "";
      gl.deleteProgram(program);
      throw new LinkIntrospectionError("Program link error", infoLog);
    }

    return new ShaderProgram(gl, program, options.label);
  }

  /** Wraps a program linked elsewhere. Throws LinkIntrospectionError if it is not linked. */
  static fromLinked(gl: GLContext, handle: GLProgram, label?: string): ShaderProgram {
    return new ShaderProgram(gl, handle, label);
  }

  get interface(): ProgramInterface {
    if (this._destroyed) {
      throw new LinkIntrospectionError(`Program '${this.label}' has been destroyed`);
    }
    if (!this.reflected) {
      this.reflected = reflectProgram(this.gl, this.handle);
      log.debug(
        "ShaderProgram",
        `Reflected '${this.label}': ${this.reflected.attributes.length} attributes, ` +
          `${this.reflected.uniformBlocks.length} blocks, ${this.reflected.samplers.length} samplers`
      );
    }
    return this.reflected;
  }

  get destroyed(): boolean {
    return this._destroyed;
  }

  destroy(): void {
    if (this._destroyed) return;
    this._destroyed = true;
    this.gl.deleteProgram(this.handle);
  }
}

function compileShader(gl: GLContext, type: number, source: string): GLShader {
  const shader = gl.createShader(type);
  if (!shader) throw new Error("Failed to create shader");

  gl.shaderSource(shader, source);
  gl.compileShader(shader);

  if (gl.getShaderParameter(shader, GL.COMPILE_STATUS) !== true) {
    const infoLog = gl.getShaderInfoLog(shader);
    gl.deleteShader(shader);
    throw new Error(`Shader compile error:\n${infoLog}`);
  }
  return shader;
}
