// CommandExecutor — replays an ended RenderPass against the context.
//
// This is the only place recorded work turns into GL calls. A pass runs as:
//   1. target: framebuffer, viewport, clears (or rasterizer discard when the
//      pass only captures)
//   2. program and fixed-function state
//   3. a fresh vertex array object, transform feedback if the pipeline
//      captures
//   4. the recorded commands, in order; blits read from their source through
//      the read framebuffer and write the pass's target
//   5. teardown, leaving no vertex array, program or framebuffer bound

import { Buffer } from "./Buffer";
import type { GLContext, GLUniformLocation } from "./GLContext";
import { GL } from "./glEnums";
import type { ContractEntry, PipelineState, UniformEntry, VertexBufferEntry } from "./Pipeline";
import type { BlendMode, PrimitiveTopology, StencilFaceState, StencilOperation } from "./PipelineBuilder";
import type { Bindable, BlitBuffer, RecordedCommand, RenderPass } from "./RenderPass";
import type { RenderTarget } from "./RenderTarget";
import { COMPARE_FUNCTIONS } from "./Sampler";
import { SampledTexture, TEXTURE_FORMATS, Texture } from "./Texture";
import type { ValueType } from "./valueTypes";
import { vertexFormatInfo } from "./VertexLayout";

export const TOPOLOGY_MODES: Readonly<Record<PrimitiveTopology, number>> = {
  points: GL.POINTS,
  lines: GL.LINES,
  "line-strip": GL.LINE_STRIP,
  "line-loop": GL.LINE_LOOP,
  triangles: GL.TRIANGLES,
  "triangle-strip": GL.TRIANGLE_STRIP,
  "triangle-fan": GL.TRIANGLE_FAN,
};

const BLEND_FACTORS: Readonly<Record<Exclude<BlendMode, "none">, [number, number]>> = {
  alpha: [GL.SRC_ALPHA, GL.ONE_MINUS_SRC_ALPHA],
  additive: [GL.ONE, GL.ONE],
  premultiplied: [GL.ONE, GL.ONE_MINUS_SRC_ALPHA],
};

const STENCIL_OPERATIONS: Readonly<Record<StencilOperation, number>> = {
  keep: GL.KEEP,
  zero: GL.ZERO,
  replace: GL.REPLACE,
  increment: GL.INCR,
  "increment-wrap": GL.INCR_WRAP,
  decrement: GL.DECR,
  "decrement-wrap": GL.DECR_WRAP,
  invert: GL.INVERT,
};

type UniformSetter = (gl: GLContext, location: GLUniformLocation, values: readonly number[]) => void;

const f32 = (values: readonly number[]) => Float32Array.from(values);
const i32 = (values: readonly number[]) => Int32Array.from(values);
const u32 = (values: readonly number[]) => Uint32Array.from(values);

const UNIFORM_SETTERS: Readonly<Record<ValueType, UniformSetter>> = {
  float: (gl, loc, v) => gl.uniform1fv(loc, f32(v)),
  vec2: (gl, loc, v) => gl.uniform2fv(loc, f32(v)),
  vec3: (gl, loc, v) => gl.uniform3fv(loc, f32(v)),
  vec4: (gl, loc, v) => gl.uniform4fv(loc, f32(v)),
  int: (gl, loc, v) => gl.uniform1iv(loc, i32(v)),
  ivec2: (gl, loc, v) => gl.uniform2iv(loc, i32(v)),
  ivec3: (gl, loc, v) => gl.uniform3iv(loc, i32(v)),
  ivec4: (gl, loc, v) => gl.uniform4iv(loc, i32(v)),
  uint: (gl, loc, v) => gl.uniform1uiv(loc, u32(v)),
  uvec2: (gl, loc, v) => gl.uniform2uiv(loc, u32(v)),
  uvec3: (gl, loc, v) => gl.uniform3uiv(loc, u32(v)),
  uvec4: (gl, loc, v) => gl.uniform4uiv(loc, u32(v)),
  bool: (gl, loc, v) => gl.uniform1iv(loc, i32(v)),
  bvec2: (gl, loc, v) => gl.uniform2iv(loc, i32(v)),
  bvec3: (gl, loc, v) => gl.uniform3iv(loc, i32(v)),
  bvec4: (gl, loc, v) => gl.uniform4iv(loc, i32(v)),
  mat2: (gl, loc, v) => gl.uniformMatrix2fv(loc, false, f32(v)),
  mat3: (gl, loc, v) => gl.uniformMatrix3fv(loc, false, f32(v)),
  mat4: (gl, loc, v) => gl.uniformMatrix4fv(loc, false, f32(v)),
  mat2x3: (gl, loc, v) => gl.uniformMatrix2x3fv(loc, false, f32(v)),
  mat2x4: (gl, loc, v) => gl.uniformMatrix2x4fv(loc, false, f32(v)),
  mat3x2: (gl, loc, v) => gl.uniformMatrix3x2fv(loc, false, f32(v)),
  mat3x4: (gl, loc, v) => gl.uniformMatrix3x4fv(loc, false, f32(v)),
  mat4x2: (gl, loc, v) => gl.uniformMatrix4x2fv(loc, false, f32(v)),
  mat4x3: (gl, loc, v) => gl.uniformMatrix4x3fv(loc, false, f32(v)),
};

function applyTarget(gl: GLContext, pass: RenderPass, target: RenderTarget): void {
  gl.bindFramebuffer(GL.FRAMEBUFFER, target.framebuffer);
  const viewport = pass.viewport ?? { x: 0, y: 0, width: target.width, height: target.height };
  gl.viewport(viewport.x, viewport.y, viewport.width, viewport.height);

  const clear = pass.clear;
  if (!clear) return;

  if (clear.color) {
    const color = [...clear.color, 0, 0, 0, 0].slice(0, 4);
    target.colorFormats.forEach((format, i) => {
      switch (TEXTURE_FORMATS[format].sampleType) {
        case "int":
          gl.clearBufferiv(GL.COLOR, i, Int32Array.from(color));
          break;
        case "uint":
          gl.clearBufferuiv(GL.COLOR, i, Uint32Array.from(color));
          break;
        default:
          gl.clearBufferfv(GL.COLOR, i, Float32Array.from(color));
      }
    });
  }

  if (clear.depth !== undefined || clear.stencil !== undefined) gl.depthMask(true);
  if (clear.stencil !== undefined) gl.stencilMask(0xff);
  if (clear.depth !== undefined && clear.stencil !== undefined) {
    gl.clearBufferfi(GL.DEPTH_STENCIL, 0, clear.depth, clear.stencil);
  } else if (clear.depth !== undefined) {
    gl.clearBufferfv(GL.DEPTH, 0, Float32Array.of(clear.depth));
  } else if (clear.stencil !== undefined) {
    gl.clearBufferiv(GL.STENCIL, 0, Int32Array.of(clear.stencil));
  }
}

function applyState(gl: GLContext, state: PipelineState): void {
  if (state.cullMode === "none") {
    gl.disable(GL.CULL_FACE);
  } else {
    gl.enable(GL.CULL_FACE);
    gl.cullFace(state.cullMode === "front" ? GL.FRONT : GL.BACK);
  }

  if (state.depth === null) {
    gl.disable(GL.DEPTH_TEST);
  } else {
    gl.enable(GL.DEPTH_TEST);
    gl.depthFunc(COMPARE_FUNCTIONS[state.depth.compare]);
    gl.depthMask(state.depth.write);
  }

  if (state.stencil === null) {
    gl.disable(GL.STENCIL_TEST);
  } else {
    const { front, back, reference, readMask, writeMask } = state.stencil;
    gl.enable(GL.STENCIL_TEST);
    applyStencilFace(gl, GL.FRONT, front, reference, readMask);
    applyStencilFace(gl, GL.BACK, back, reference, readMask);
    gl.stencilMask(writeMask);
  }

  if (state.blend === "none") {
    gl.disable(GL.BLEND);
  } else {
    const [src, dst] = BLEND_FACTORS[state.blend];
    gl.enable(GL.BLEND);
    gl.blendFunc(src, dst);
  }
}

function applyStencilFace(gl: GLContext, face: number, state: StencilFaceState, reference: number, readMask: number): void {
  gl.stencilFuncSeparate(face, COMPARE_FUNCTIONS[state.compare], reference, readMask);
  gl.stencilOpSeparate(
    face,
    STENCIL_OPERATIONS[state.fail],
    STENCIL_OPERATIONS[state.depthFail],
    STENCIL_OPERATIONS[state.pass]
  );
}

function bindVertexBuffer(gl: GLContext, entry: VertexBufferEntry, buffer: Buffer): void {
  gl.bindBuffer(GL.ARRAY_BUFFER, buffer.handle);
  for (const attribute of entry.attributes) {
    const format = vertexFormatInfo(attribute.format);
    for (let i = 0; i < attribute.span; i++) {
      const location = attribute.location + i;
      const offset = attribute.byteOffset + i * format.byteSize;
      gl.enableVertexAttribArray(location);
      if (format.shaderScalar === "float") {
        gl.vertexAttribPointer(location, format.components, format.componentType, format.normalized, entry.arrayStride, offset);
      } else {
        gl.vertexAttribIPointer(location, format.components, format.componentType, entry.arrayStride, offset);
      }
      gl.vertexAttribDivisor(location, entry.stepMode === "instance" ? 1 : 0);
    }
  }
  gl.bindBuffer(GL.ARRAY_BUFFER, null);
}

function bindResource(gl: GLContext, entry: ContractEntry, resource: Bindable): void {
  switch (entry.category) {
    case "vertex-buffer":
      if (resource instanceof Buffer) bindVertexBuffer(gl, entry, resource);
      return;
    case "uniform-block":
      if (resource instanceof Buffer) gl.bindBufferBase(GL.UNIFORM_BUFFER, entry.binding, resource.handle);
      return;
    case "sampler": {
      const texture = resource instanceof SampledTexture ? resource.texture : resource;
      if (!(texture instanceof Texture)) return;
      gl.activeTexture(GL.TEXTURE0 + entry.unit);
      gl.bindTexture(texture.target, texture.handle);
      gl.bindSampler(entry.unit, resource instanceof SampledTexture ? resource.sampler.handle : null);
      return;
    }
  }
}

const BLIT_BITS: Readonly<Record<BlitBuffer, number>> = {
  color: GL.COLOR_BUFFER_BIT,
  depth: GL.DEPTH_BUFFER_BIT,
  stencil: GL.STENCIL_BUFFER_BIT,
};

function blit(gl: GLContext, command: Extract<RecordedCommand, { op: "blit" }>, destination: RenderTarget): void {
  const { source, sourceRegion: from, region: to } = command;
  const mask = command.buffers.reduce((bits, buffer) => bits | BLIT_BITS[buffer], 0);

  gl.bindFramebuffer(GL.READ_FRAMEBUFFER, source.framebuffer);
  gl.blitFramebuffer(
    from.x, from.y, from.x + from.width, from.y + from.height,
    to.x, to.y, to.x + to.width, to.y + to.height,
    mask,
    command.filter === "linear" ? GL.LINEAR : GL.NEAREST
  );
  gl.bindFramebuffer(GL.READ_FRAMEBUFFER, destination.framebuffer);
}

function setUniform(gl: GLContext, entry: UniformEntry, values: readonly number[]): void {
  UNIFORM_SETTERS[entry.type](gl, entry.location, values);
}

/** Replays one ended pass. The program must not have been destroyed. */
export function executeRenderPass(gl: GLContext, pass: RenderPass): void {
  const { pipeline, target } = pass;
  const mode = TOPOLOGY_MODES[pipeline.state.primitive];
  const capture = pipeline.contract.capture;

  if (target) {
    applyTarget(gl, pass, target);
  } else {
    gl.enable(GL.RASTERIZER_DISCARD);
  }

  gl.useProgram(pipeline.program.handle);
  applyState(gl, pipeline.state);

  const vao = gl.createVertexArray();
  if (!vao) throw new Error("Failed to create vertex array");
  gl.bindVertexArray(vao);

  const transformFeedback = capture ? gl.createTransformFeedback() : null;
  if (transformFeedback) {
    gl.bindTransformFeedback(GL.TRANSFORM_FEEDBACK, transformFeedback);
    pass.captureBuffers.forEach((buffer, i) => gl.bindBufferBase(GL.TRANSFORM_FEEDBACK_BUFFER, i, buffer.handle));
    gl.beginTransformFeedback(mode);
  }

  let indexBuffer: Buffer | null = null;
  for (const command of pass.recorded) {
    switch (command.op) {
      case "bind":
        bindResource(gl, command.entry, command.resource);
        break;
      case "uniform":
        setUniform(gl, command.entry, command.values);
        break;
      case "index-buffer":
        indexBuffer = command.buffer;
        gl.bindBuffer(GL.ELEMENT_ARRAY_BUFFER, command.buffer.handle);
        break;
      case "draw":
        gl.drawArraysInstanced(mode, command.firstVertex, command.vertexCount, command.instanceCount);
        break;
      case "draw-indexed": {
        if (!indexBuffer) break;
        const type = indexBuffer.indexFormat === "uint32" ? GL.UNSIGNED_INT : GL.UNSIGNED_SHORT;
        gl.drawElementsInstanced(
          mode, command.indexCount, type, command.firstIndex * indexBuffer.bytesPerIndex, command.instanceCount
        );
        break;
      }
      case "blit":
        if (target) blit(gl, command, target);
        break;
    }
  }

  if (transformFeedback) {
    gl.endTransformFeedback();
    pass.captureBuffers.forEach((_, i) => gl.bindBufferBase(GL.TRANSFORM_FEEDBACK_BUFFER, i, null));
    gl.bindTransformFeedback(GL.TRANSFORM_FEEDBACK, null);
    gl.deleteTransformFeedback(transformFeedback);
  }

  gl.bindVertexArray(null);
  gl.deleteVertexArray(vao);
  gl.useProgram(null);
  if (target) {
    gl.bindFramebuffer(GL.FRAMEBUFFER, null);
  } else {
    gl.disable(GL.RASTERIZER_DISCARD);
  }
}
