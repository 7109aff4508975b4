// Device — the entry point. Wraps a caller-created WebGL2 context and owns
// everything that touches it over time: resource creation, pipeline building,
// pass submission and the fence queue.
//
// Typical frame:
//
//   const pass = device.beginRenderPass({ pipeline, clear: { color: [0, 0, 0, 1] } });
//   pass.bind("vertices", quad).bind("Globals", globals).draw({ vertexCount: 6 });
//   pass.end();
//   const fence = device.submit(pass);
//   await fence.wait(); // only when the results are needed on the CPU
//
// Once the context is lost the device stays lost: pending fences reject and
// every later submit throws DeviceLostError. Recovery means a new context and
// a new Device.

import { Buffer, type BufferDescriptor } from "./Buffer";
import { executeRenderPass } from "./CommandExecutor";
import { resolveContextOptions, type ContextOptions } from "./config";
import { BindingMismatchError, DeviceLostError, PassStateError, describeMismatch } from "./errors";
import { Fence, FenceQueue } from "./Fence";
import type { GLContext, GLProgram } from "./GLContext";
import { GL } from "./glEnums";
import { log, setLogLevel } from "./log";
import type { Pipeline } from "./Pipeline";
import {
  buildPipeline,
  type BuildResult,
  type PipelineDescriptor,
  type SlotName,
  type UniformName,
} from "./PipelineBuilder";
import { Renderbuffer, type RenderbufferDescriptor } from "./Renderbuffer";
import { RenderPass, type RenderPassOptions } from "./RenderPass";
import { RenderTarget, type RenderTargetDescriptor } from "./RenderTarget";
import { Sampler, type SamplerOptions } from "./Sampler";
import { ShaderProgram, type ShaderProgramOptions } from "./ShaderProgram";
import { Texture, readbackFormat, type TextureDescriptor, type TextureRegion } from "./Texture";

export interface RenderPassDescriptor<S extends string = string, U extends string = string> extends RenderPassOptions {
  readonly pipeline: Pipeline<S, U>;
  /** Defaults to the default framebuffer; null for capture-only passes. */
  readonly target?: RenderTarget | null;
}

export interface PixelRegion {
  readonly x?: number;
  readonly y?: number;
  readonly width?: number;
  readonly height?: number;
}

export type PixelData = Uint8Array | Float32Array | Int32Array | Uint32Array;

let nextFenceId = 0;

function pixelArray(type: number, byteLength: number): PixelData {
  switch (type) {
    case GL.FLOAT:
      return new Float32Array(byteLength / 4);
    case GL.INT:
      return new Int32Array(byteLength / 4);
    case GL.UNSIGNED_INT:
      return new Uint32Array(byteLength / 4);
    default:
      return new Uint8Array(byteLength);
  }
}

export class Device {
  readonly defaultTarget: RenderTarget;
  private queue: FenceQueue;
  private lostError: DeviceLostError | null = null;

  private constructor(readonly gl: GLContext, readonly options: ContextOptions) {
    this.defaultTarget = RenderTarget.defaultFramebuffer(gl, options);
    this.queue = new FenceQueue(gl, options.fencePollIntervalMs, () => this.markLost("context lost"));
  }

  /**
   * Wraps `gl`. The depth, stencil and samples options must describe how the
   * context was created, since pipelines rendering to the default framebuffer
   * are checked against them.
   */
  static create(gl: GLContext, overrides: Partial<ContextOptions> = {}): Device {
    const options = resolveContextOptions(overrides);
    setLogLevel(options.logLevel);
    if (gl.isContextLost()) throw new DeviceLostError("context was lost before the device was created");

    const device = new Device(gl, options);
    log.info(
      "Device",
      `Created (${gl.drawingBufferWidth}x${gl.drawingBufferHeight}, ${device.defaultTarget.outputs.colorFormats.join("+")}` +
        `${options.depth || options.stencil ? ", depth" : ""}${options.stencil ? ", stencil" : ""}, x${options.samples})`
    );
    return device;
  }

  get lost(): boolean {
    return this.lostError !== null;
  }

  /** Fences waiting on the GPU. */
  get pendingFences(): number {
    return this.queue.size;
  }

  // ---------------------------------------------------------------------------
  // Programs and pipelines
  // ---------------------------------------------------------------------------

  createProgram(vertexSource: string, fragmentSource: string, options: ShaderProgramOptions = {}): ShaderProgram {
    this.assertAlive();
    return ShaderProgram.compile(this.gl, vertexSource, fragmentSource, options);
  }

  /** Adopts a program linked outside the library. */
  wrapProgram(handle: GLProgram, label?: string): ShaderProgram {
    this.assertAlive();
    return ShaderProgram.fromLinked(this.gl, handle, label);
  }

  /** Builds a pipeline or throws BindingMismatchError. */
  createPipeline<D extends PipelineDescriptor>(
    program: ShaderProgram,
    descriptor: D
  ): Pipeline<SlotName<D>, UniformName<D>> {
    const result = this.tryCreatePipeline(program, descriptor);
    if (!result.ok) throw new BindingMismatchError(result.mismatch, descriptor.label ?? program.label);
    return result.pipeline;
  }

  tryCreatePipeline<D extends PipelineDescriptor>(
    program: ShaderProgram,
    descriptor: D
  ): BuildResult<SlotName<D>, UniformName<D>> {
    this.assertAlive();
    const result = buildPipeline(program, descriptor);
    if (result.ok) {
      const { contract } = result.pipeline;
      log.debug(
        "Pipeline",
        `Built '${result.pipeline.label}': ${contract.required.length} slots, ${contract.uniforms.size} uniforms` +
          (contract.ignored.size > 0 ? `, ignored ${[...contract.ignored].join(", ")}` : "")
      );
    } else {
      log.warn("Pipeline", `'${descriptor.label ?? program.label}' rejected: ${describeMismatch(result.mismatch)}`);
    }
    return result;
  }

  // ---------------------------------------------------------------------------
  // Resources
  // ---------------------------------------------------------------------------

  createBuffer(descriptor: BufferDescriptor): Buffer {
    this.assertAlive();
    return new Buffer(this.gl, descriptor);
  }

  writeBuffer(buffer: Buffer, data: ArrayBufferView, byteOffset = 0): void {
    this.assertAlive();
    buffer.write(data, byteOffset);
  }

  createTexture(descriptor: TextureDescriptor): Texture {
    this.assertAlive();
    return new Texture(this.gl, descriptor);
  }

  writeTexture(texture: Texture, data: ArrayBufferView, region?: TextureRegion): void {
    this.assertAlive();
    texture.write(data, region);
  }

  createSampler(options: SamplerOptions = {}): Sampler {
    this.assertAlive();
    return new Sampler(this.gl, options);
  }

  createRenderbuffer(descriptor: RenderbufferDescriptor): Renderbuffer {
    this.assertAlive();
    return new Renderbuffer(this.gl, descriptor);
  }

  createRenderTarget(descriptor: RenderTargetDescriptor): RenderTarget {
    this.assertAlive();
    return RenderTarget.create(this.gl, descriptor);
  }

  // ---------------------------------------------------------------------------
  // Passes and submission
  // ---------------------------------------------------------------------------

  beginRenderPass<S extends string, U extends string>(descriptor: RenderPassDescriptor<S, U>): RenderPass<S, U> {
    this.assertAlive();
    const target = descriptor.target === undefined ? this.defaultTarget : descriptor.target;
    return new RenderPass(descriptor.pipeline, target, descriptor);
  }

  /**
   * Scoped pass: ends it when `record` returns, abandons it when `record`
   * throws. The pass is returned ready to submit.
   */
  encodeRenderPass<S extends string, U extends string>(
    descriptor: RenderPassDescriptor<S, U>,
    record: (pass: RenderPass<S, U>) => void
  ): RenderPass<S, U> {
    const pass = this.beginRenderPass(descriptor);
    try {
      record(pass);
    } catch (error) {
      if (pass.state === "open") pass.abandon();
      throw error;
    }
    if (pass.state === "open") pass.end();
    return pass;
  }

  /**
   * Replays ended passes in order and returns a fence that signals once the
   * GPU has finished them. Every pass is checked before anything runs.
   */
  submit(passes: RenderPass | readonly RenderPass[]): Fence {
    const list = passes instanceof RenderPass ? [passes] : passes;
    this.assertAlive();
    if (this.gl.isContextLost()) {
      this.markLost("context lost");
      this.assertAlive();
    }

    const seen = new Set<RenderPass>();
    for (const pass of list) {
      if (pass.state !== "ended" || pass.submitted) {
        throw new PassStateError(pass.label, pass.submitted ? "submitted" : pass.state, "submit");
      }
      if (seen.has(pass)) throw new PassStateError(pass.label, "already in this submission", "submit");
      seen.add(pass);
      if (pass.pipeline.isReleased) {
        throw new Error(`Render pass '${pass.label}' uses released pipeline '${pass.pipeline.label}'`);
      }
      for (const resource of pass.resources) {
        if (resource.destroyed) {
          throw new Error(`Render pass '${pass.label}' references destroyed resource '${resource.label}'`);
        }
      }
    }

    for (const pass of list) {
      executeRenderPass(this.gl, pass);
      pass.markSubmitted();
    }

    const fence = this.insertFence();
    log.debug("Device", `Submitted ${list.map((p) => `'${p.label}'`).join(", ") || "no passes"} → '${fence.label}'`);
    this.checkErrors();
    return fence;
  }

  /** Copies a buffer's contents back once all previously submitted work is done. */
  async readBuffer(buffer: Buffer): Promise<Uint8Array> {
    this.assertAlive();
    if (buffer.destroyed) throw new Error(`Buffer '${buffer.label}' has been destroyed`);

    await this.insertFence().wait();
    if (buffer.destroyed) throw new Error(`Buffer '${buffer.label}' was destroyed before readback`);

    const out = new Uint8Array(buffer.byteLength);
    this.gl.bindBuffer(GL.COPY_READ_BUFFER, buffer.handle);
    this.gl.getBufferSubData(GL.COPY_READ_BUFFER, 0, out);
    this.gl.bindBuffer(GL.COPY_READ_BUFFER, null);
    return out;
  }

  /**
   * Reads the first color attachment of `target` without stalling: pixels go
   * into a pixel pack buffer, which is copied out after a fence. Normalized
   * formats return RGBA bytes, float formats RGBA floats, integer formats
   * RGBA 32-bit integers.
   */
  async readPixels(target: RenderTarget, region: PixelRegion = {}): Promise<PixelData> {
    this.assertAlive();
    if (target.destroyed) throw new Error(`Render target '${target.label}' has been destroyed`);
    if (target.samples > 1) {
      throw new RangeError(`Render target '${target.label}' is multisampled and cannot be read directly`);
    }
    const format = target.colorFormats[0];
    if (format === undefined) throw new RangeError(`Render target '${target.label}' has no color attachment`);

    const x = region.x ?? 0;
    const y = region.y ?? 0;
    const width = region.width ?? target.width - x;
    const height = region.height ?? target.height - y;
    if (x < 0 || y < 0 || width < 1 || height < 1 || x + width > target.width || y + height > target.height) {
      throw new RangeError(`Region ${x},${y} ${width}x${height} lies outside '${target.label}'`);
    }

    const gl = this.gl;
    const readback = readbackFormat(format);
    const byteLength = width * height * readback.bytesPerPixel;
    const pbo = gl.createBuffer();
    if (!pbo) throw new Error("Failed to create pixel pack buffer");

    try {
      gl.bindFramebuffer(GL.READ_FRAMEBUFFER, target.framebuffer);
      gl.readBuffer(target.framebuffer === null ? GL.BACK : GL.COLOR_ATTACHMENT0);
      gl.bindBuffer(GL.PIXEL_PACK_BUFFER, pbo);
      gl.bufferData(GL.PIXEL_PACK_BUFFER, byteLength, GL.STREAM_READ);
      gl.readPixels(x, y, width, height, readback.format, readback.type, 0);
      gl.bindBuffer(GL.PIXEL_PACK_BUFFER, null);
      gl.bindFramebuffer(GL.READ_FRAMEBUFFER, null);

      await this.insertFence().wait();

      const out = pixelArray(readback.type, byteLength);
      gl.bindBuffer(GL.PIXEL_PACK_BUFFER, pbo);
      gl.getBufferSubData(GL.PIXEL_PACK_BUFFER, 0, out);
      gl.bindBuffer(GL.PIXEL_PACK_BUFFER, null);
      return out;
    } finally {
      gl.deleteBuffer(pbo);
    }
  }

  /** Checks pending sync objects now instead of waiting for the next timer tick. */
  poll(): void {
    if (!this.lost) this.queue.poll();
  }

  /** Stops polling and fails whatever is still pending. The context itself is the caller's. */
  destroy(): void {
    this.markLost("device destroyed");
  }

  private insertFence(): Fence {
    const fence = new Fence(`fence#${nextFenceId++}`);
    const sync = this.gl.fenceSync(GL.SYNC_GPU_COMMANDS_COMPLETE, 0);
    this.gl.flush();
    if (!sync) {
      this.markLost("fenceSync returned no sync object");
      fence.fail(this.lostErrorOrDefault());
      return fence;
    }
    this.queue.enqueue(fence, sync);
    return fence;
  }

  private checkErrors(): void {
    if (!this.options.checkErrors) return;
    const error = this.gl.getError();
    if (error === GL.NO_ERROR) return;
    if (error === GL.OUT_OF_MEMORY || error === GL.CONTEXT_LOST_WEBGL) {
      this.markLost(error === GL.OUT_OF_MEMORY ? "out of memory" : "context lost");
    } else {
      log.warn("Device", `GL error 0x${error.toString(16)} after submit`);
    }
  }

  private markLost(reason: string): void {
    if (this.lostError) return;
    this.lostError = new DeviceLostError(reason);
    this.queue.failAll(this.lostError);
    log.error("Device", this.lostError.message);
  }

  private lostErrorOrDefault(): DeviceLostError {
    return this.lostError ?? new DeviceLostError("unknown");
  }

  private assertAlive(): void {
    if (this.lostError) throw this.lostError;
  }
}
