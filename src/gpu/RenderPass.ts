// RenderPass — records binds and draws against one Pipeline and one target.
//
//   open ──end()────▶ ended      (terminal; may be submitted once)
//     └───abandon()──▶ abandoned  (terminal; never touches the device)
//
// Recording makes no GL calls. Every bind is checked against the pipeline's
// contract by tag comparison; a rejected bind leaves the previous binding in
// place. The command list is replayed by CommandExecutor when the Device
// submits the pass.
//
// Resources are borrowed while the pass is open: bound buffers, textures,
// samplers and blit sources for reading, capture buffers and the target for
// writing.
// Borrows are returned at end() or abandon().

import { Buffer } from "./Buffer";
import {
  BindingRejectedError,
  CaptureOverflowError,
  IncompatibleBlitError,
  IncompleteBindingError,
  PassStateError,
  TargetMismatchError,
} from "./errors";
import { log } from "./log";
import type { ContractEntry, Pipeline, UniformEntry } from "./Pipeline";
import type { PrimitiveTopology } from "./PipelineBuilder";
import type { Access, Resource } from "./Resource";
import { describeOutputs, type RenderTarget } from "./RenderTarget";
import { SampledTexture, TEXTURE_FORMATS, Texture } from "./Texture";
import { flattenValue, type UniformInput } from "./valueTypes";

export type Bindable = Buffer | Texture | SampledTexture;

export type PassState = "open" | "ended" | "abandoned";

export interface ClearValues {
  /** Applied to every color attachment. */
  readonly color?: readonly number[];
  readonly depth?: number;
  readonly stencil?: number;
}

export interface Viewport {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

export interface RenderPassOptions {
  readonly label?: string;
  /** Buffers receiving transform feedback output, one per capture stream. */
  readonly capture?: readonly Buffer[];
  readonly clear?: ClearValues;
  readonly viewport?: Viewport;
}

export type BlitBuffer = "color" | "depth" | "stencil";

export type BlitFilter = "nearest" | "linear";

export interface BlitOptions {
  /** Defaults to ["color"]. */
  readonly buffers?: readonly BlitBuffer[];
  /** Defaults to "nearest". Depth and stencil blits take nearest only. */
  readonly filter?: BlitFilter;
  /** Defaults to the whole source. */
  readonly sourceRegion?: Viewport;
  /** Defaults to the whole target; scales when it differs in size from the source region. */
  readonly region?: Viewport;
}

export interface DrawRange {
  readonly vertexCount: number;
  readonly firstVertex?: number;
  readonly instanceCount?: number;
}

export interface IndexedDrawRange {
  readonly indexCount: number;
  readonly firstIndex?: number;
  readonly instanceCount?: number;
}

export type RecordedCommand =
  | { readonly op: "bind"; readonly entry: ContractEntry; readonly resource: Bindable }
  | { readonly op: "uniform"; readonly entry: UniformEntry; readonly values: readonly number[] }
  | { readonly op: "index-buffer"; readonly buffer: Buffer }
  | { readonly op: "draw"; readonly vertexCount: number; readonly firstVertex: number; readonly instanceCount: number }
  | { readonly op: "draw-indexed"; readonly indexCount: number; readonly firstIndex: number; readonly instanceCount: number }
  | {
      readonly op: "blit";
      readonly source: RenderTarget;
      readonly sourceRegion: Viewport;
      readonly region: Viewport;
      readonly buffers: readonly BlitBuffer[];
      readonly filter: BlitFilter;
    };

const VERTICES_PER_PRIMITIVE: Partial<Record<PrimitiveTopology, number>> = {
  points: 1,
  lines: 2,
  triangles: 3,
};

let nextPassId = 0;

function assertCount(value: number, what: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(`${what} must be a non-negative integer, got ${value}`);
  }
}

/** The resources a binding borrows: a sampled texture borrows its texture and its sampler. */
function heldResources(resource: Bindable): Resource[] {
  return resource instanceof SampledTexture ? [resource.texture, resource.sampler] : [resource];
}

function wholeOf(target: RenderTarget): Viewport {
  return { x: 0, y: 0, width: target.width, height: target.height };
}

function describeRegion(region: Viewport): string {
  return `${region.x},${region.y} ${region.width}x${region.height}`;
}

function regionFits(region: Viewport, target: RenderTarget): boolean {
  return (
    region.x >= 0 &&
    region.y >= 0 &&
    region.width > 0 &&
    region.height > 0 &&
    region.x + region.width <= target.width &&
    region.y + region.height <= target.height
  );
}

/** Returns why `source` cannot be blitted into `destination`, or null. */
function blitProblem(
  source: RenderTarget,
  destination: RenderTarget,
  command: { sourceRegion: Viewport; region: Viewport; buffers: readonly BlitBuffer[]; filter: BlitFilter }
): string | null {
  const { sourceRegion, region, buffers, filter } = command;
  if (source.destroyed) return `'${source.label}' has been destroyed`;
  if (buffers.length === 0) return "no buffers selected";
  if (destination.samples > 1) return "the destination is multisampled";
  if (!regionFits(sourceRegion, source)) {
    return `source region ${describeRegion(sourceRegion)} lies outside '${source.label}'`;
  }
  if (!regionFits(region, destination)) {
    return `region ${describeRegion(region)} lies outside '${destination.label}'`;
  }

  if (buffers.includes("color")) {
    const read = source.colorFormats[0];
    if (read === undefined) return "the source has no color attachment";
    const readType = TEXTURE_FORMATS[read].sampleType;
    for (const format of destination.colorFormats) {
      if (TEXTURE_FORMATS[format].sampleType !== readType) {
        return `color formats ${read} and ${format} are incompatible`;
      }
      if (source.samples > 1 && format !== read) {
        return `resolving needs identical color formats, got ${read} and ${format}`;
      }
    }
    if (filter === "linear" && readType !== "float") return `linear filtering cannot read ${read}`;
  }

  if (buffers.includes("depth") || buffers.includes("stencil")) {
    if (filter !== "nearest") return "depth and stencil blits must use nearest filtering";
    const from = source.depthFormat;
    const to = destination.depthFormat;
    if (from === undefined || from !== to) {
      return `depth formats ${from ?? "<none>"} and ${to ?? "<none>"} differ`;
    }
    if (buffers.includes("stencil") && !TEXTURE_FORMATS[from].hasStencil) {
      return `${from} has no stencil`;
    }
  }

  if (
    source.samples > 1 &&
    (sourceRegion.x !== region.x ||
      sourceRegion.y !== region.y ||
      sourceRegion.width !== region.width ||
      sourceRegion.height !== region.height)
  ) {
    return "a multisampled source needs identical source and destination regions";
  }
  return null;
}

function checkTarget(pipeline: Pipeline, target: RenderTarget | null): void {
  const outputs = pipeline.contract.outputs;
  if (outputs === null) {
    if (target !== null) throw new TargetMismatchError("no render target", describeOutputs(target.outputs));
    return;
  }
  if (target === null) throw new TargetMismatchError(describeOutputs(outputs), "no render target");
  if (target.destroyed) throw new Error(`Render target '${target.label}' has been destroyed`);

  const expected = describeOutputs(outputs);
  const actual = describeOutputs(target.outputs);
  if (expected !== actual) throw new TargetMismatchError(expected, actual);
}

export class RenderPass<S extends string = string, U extends string = string> {
  readonly label: string;
  readonly captureBuffers: readonly Buffer[];
  readonly clear: ClearValues | undefined;
  readonly viewport: Viewport | undefined;

  private _state: PassState = "open";
  private _submitted = false;
  private commands: RecordedCommand[] = [];
  private bound: (Bindable | undefined)[];
  private uniformsSet: boolean[];
  private indexBuffer: Buffer | null = null;
  private capturedVertices = 0;
  private holds: { resource: Resource; access: Access }[] = [];
  private touched = new Set<Resource>();

  constructor(
    readonly pipeline: Pipeline<S, U>,
    readonly target: RenderTarget | null,
    options: RenderPassOptions = {}
  ) {
    this.label = options.label ?? `pass#${nextPassId++}`;
    this.captureBuffers = options.capture ?? [];
    this.clear = options.clear;
    this.viewport = options.viewport;
    this.bound = new Array<Bindable | undefined>(pipeline.contract.required.length).fill(undefined);
    this.uniformsSet = new Array<boolean>(pipeline.contract.uniforms.size).fill(false);

    if (pipeline.isReleased) throw new Error(`Pipeline '${pipeline.label}' has been released`);
    checkTarget(pipeline, target);
    this.checkCapture();

    try {
      for (const buffer of this.captureBuffers) this.hold(buffer, "write");
      for (const resource of target?.parts ?? []) this.hold(resource, "write");
    } catch (error) {
      this.releaseHolds();
      throw error;
    }
    log.debug("RenderPass", `Begin '${this.label}' with pipeline '${pipeline.label}'`);
  }

  get state(): PassState {
    return this._state;
  }

  get submitted(): boolean {
    return this._submitted;
  }

  /** Recorded commands, in order. */
  get recorded(): readonly RecordedCommand[] {
    return this.commands;
  }

  /** Vertices written to each capture buffer so far. */
  get captured(): number {
    return this.capturedVertices;
  }

  /** Every resource the recorded commands reference. */
  get resources(): ReadonlySet<Resource> {
    return this.touched;
  }

  bind(slot: S, resource: Bindable): this {
    this.assertOpen("bind");

    const entry = this.pipeline.contract.slots.get(slot);
    if (!entry) {
      if (this.pipeline.contract.ignored.has(slot)) {
        log.debug("RenderPass", `'${slot}' matches nothing in '${this.pipeline.label}'; bind ignored`);
        return this;
      }
      throw new BindingRejectedError(slot, `pipeline '${this.pipeline.label}' has no such slot`);
    }

    this.checkBindable(entry, resource);

    const previous = this.bound[entry.ordinal];
    this.holdAll(heldResources(resource), "read");
    if (previous) for (const r of heldResources(previous)) this.unhold(r, "read");

    this.bound[entry.ordinal] = resource;
    this.commands.push({ op: "bind", entry, resource });
    return this;
  }

  /** What is currently bound to `slot`, if anything. */
  boundResource(slot: S): Bindable | undefined {
    const entry = this.pipeline.contract.slots.get(slot);
    return entry ? this.bound[entry.ordinal] : undefined;
  }

  setUniform(name: U, value: UniformInput): this {
    this.assertOpen("set uniform on");

    const entry = this.pipeline.contract.uniforms.get(name);
    if (!entry) {
      if (this.pipeline.contract.ignored.has(name)) {
        log.debug("RenderPass", `Uniform '${name}' is inactive in '${this.pipeline.label}'; ignored`);
        return this;
      }
      throw new BindingRejectedError(name, `pipeline '${this.pipeline.label}' has no such uniform`);
    }

    let values: number[];
    try {
      values = flattenValue(value);
    } catch (error) {
      throw new BindingRejectedError(name, error instanceof Error ? error.message : String(error));
    }
    if (values.length !== entry.components) {
      throw new BindingRejectedError(name, `expects ${entry.components} components, got ${values.length}`);
    }

    this.uniformsSet[entry.ordinal] = true;
    this.commands.push({ op: "uniform", entry, values });
    return this;
  }

  setIndexBuffer(buffer: Buffer): this {
    this.assertOpen("set index buffer on");
    if (buffer.usage !== "index") {
      throw new BindingRejectedError("index", `'${buffer.label}' is a ${buffer.usage} buffer`);
    }
    if (buffer.destroyed) throw new BindingRejectedError("index", `'${buffer.label}' has been destroyed`);

    const previous = this.indexBuffer;
    this.hold(buffer, "read");
    if (previous) this.unhold(previous, "read");

    this.indexBuffer = buffer;
    this.commands.push({ op: "index-buffer", buffer });
    return this;
  }

  draw(range: DrawRange): this {
    this.assertOpen("draw in");
    const firstVertex = range.firstVertex ?? 0;
    const instanceCount = range.instanceCount ?? 1;
    assertCount(range.vertexCount, "vertexCount");
    assertCount(firstVertex, "firstVertex");
    assertCount(instanceCount, "instanceCount");
    this.checkComplete();

    this.countCapture(range.vertexCount, instanceCount);
    this.commands.push({ op: "draw", vertexCount: range.vertexCount, firstVertex, instanceCount });
    return this;
  }

  drawIndexed(range: IndexedDrawRange): this {
    this.assertOpen("draw in");
    const firstIndex = range.firstIndex ?? 0;
    const instanceCount = range.instanceCount ?? 1;
    assertCount(range.indexCount, "indexCount");
    assertCount(firstIndex, "firstIndex");
    assertCount(instanceCount, "instanceCount");
    this.checkComplete();

    const indexBuffer = this.indexBuffer;
    if (!indexBuffer) throw new IncompleteBindingError("index");
    if (firstIndex + range.indexCount > indexBuffer.indexCount) {
      throw new RangeError(
        `Indices ${firstIndex}..${firstIndex + range.indexCount} exceed '${indexBuffer.label}' (${indexBuffer.indexCount} indices)`
      );
    }

    this.countCapture(range.indexCount, instanceCount);
    this.commands.push({ op: "draw-indexed", indexCount: range.indexCount, firstIndex, instanceCount });
    return this;
  }

  /**
   * Copies `source` into this pass's target when the pass is replayed, after
   * the commands recorded before it. Scales between regions of different
   * sizes. The source is held for reading until the pass ends.
   */
  blit(source: RenderTarget, options: BlitOptions = {}): this {
    this.assertOpen("blit in");
    const destination = this.target;
    if (!destination) throw new IncompatibleBlitError(source.label, "<none>", "the pass has no render target");

    const command = {
      op: "blit",
      source,
      sourceRegion: options.sourceRegion ?? wholeOf(source),
      region: options.region ?? wholeOf(destination),
      buffers: options.buffers ?? ["color"],
      filter: options.filter ?? "nearest",
    } as const;
    const problem = blitProblem(source, destination, command);
    if (problem !== null) throw new IncompatibleBlitError(source.label, destination.label, problem);

    this.holdAll(source.parts, "read");
    this.commands.push(command);
    return this;
  }

  /** Resolves a multisampled `source` into this pass's single-sample target of the same size and formats. */
  resolve(source: RenderTarget): this {
    this.assertOpen("resolve in");
    if (source.samples <= 1) {
      throw new IncompatibleBlitError(source.label, this.target?.label ?? "<none>", "the source is not multisampled");
    }
    return this.blit(source);
  }

  /**
   * Finalizes the pass. Throws CaptureOverflowError (and abandons the pass)
   * when the recorded draws capture more than a capture buffer holds.
   */
  end(): void {
    this.assertOpen("end");

    const capture = this.pipeline.contract.capture;
    if (capture) {
      for (let i = 0; i < this.captureBuffers.length; i++) {
        const buffer = this.captureBuffers[i];
        const required = this.capturedVertices * capture.bufferStrides[i];
        if (required > buffer.byteLength) {
          this.abandon();
          throw new CaptureOverflowError(buffer.label, required, buffer.byteLength);
        }
      }
    }

    this._state = "ended";
    this.releaseHolds();
    log.debug("RenderPass", `End '${this.label}': ${this.commands.length} commands`);
  }

  abandon(): void {
    this.assertOpen("abandon");
    this._state = "abandoned";
    this.commands = [];
    this.releaseHolds();
    log.debug("RenderPass", `Abandoned '${this.label}'`);
  }

  /** Called by Device.submit once the commands have been replayed. */
  markSubmitted(): void {
    if (this._state !== "ended" || this._submitted) {
      throw new PassStateError(this.label, this._submitted ? "submitted" : this._state, "submit");
    }
    this._submitted = true;
  }

  private assertOpen(operation: string): void {
    if (this._state !== "open") throw new PassStateError(this.label, this._state, operation);
  }

  private checkCapture(): void {
    const capture = this.pipeline.contract.capture;
    if (!capture) {
      if (this.captureBuffers.length > 0) {
        throw new BindingRejectedError("capture", `pipeline '${this.pipeline.label}' captures no varyings`);
      }
      return;
    }
    if (this.captureBuffers.length !== capture.bufferStrides.length) {
      throw new BindingRejectedError(
        "capture",
        `expects ${capture.bufferStrides.length} capture buffer(s), got ${this.captureBuffers.length}`
      );
    }
    for (const buffer of this.captureBuffers) {
      if (!buffer.capture) {
        throw new BindingRejectedError("capture", `'${buffer.label}' was not created with capture enabled`);
      }
      if (buffer.destroyed) throw new BindingRejectedError("capture", `'${buffer.label}' has been destroyed`);
    }
  }

  private checkBindable(entry: ContractEntry, resource: Bindable): void {
    const held = resource instanceof SampledTexture ? resource.texture : resource;
    if (held.destroyed) throw new BindingRejectedError(entry.slot, `'${resource.label}' has been destroyed`);

    switch (entry.category) {
      case "vertex-buffer":
      case "uniform-block": {
        const usage = entry.category === "vertex-buffer" ? "vertex" : "uniform";
        if (!(resource instanceof Buffer) || resource.usage !== usage) {
          throw new BindingRejectedError(entry.slot, `expects a ${usage} buffer`);
        }
        if (resource.layoutTag !== entry.tag) {
          throw new BindingRejectedError(entry.slot, `expects layout ${entry.tag}, got ${resource.layoutTag}`);
        }
        return;
      }
      case "sampler": {
        if (!(resource instanceof Texture || resource instanceof SampledTexture)) {
          throw new BindingRejectedError(entry.slot, "expects a texture");
        }
        if (!entry.accepted.has(resource.layoutTag)) {
          throw new BindingRejectedError(
            entry.slot,
            `${entry.samplerKind} cannot read a ${resource.layoutTag} texture`
          );
        }
        if (entry.requiresCompare && !(resource instanceof SampledTexture && resource.sampler.compare !== null)) {
          throw new BindingRejectedError(entry.slot, `${entry.samplerKind} needs a sampler with a compare function`);
        }
        if (resource instanceof SampledTexture && resource.sampler.destroyed) {
          throw new BindingRejectedError(entry.slot, `sampler '${resource.sampler.label}' has been destroyed`);
        }
        return;
      }
    }
  }

  private checkComplete(): void {
    for (const entry of this.pipeline.contract.required) {
      if (this.bound[entry.ordinal] === undefined) throw new IncompleteBindingError(entry.slot);
    }
    for (const entry of this.pipeline.contract.uniforms.values()) {
      if (!this.uniformsSet[entry.ordinal]) throw new IncompleteBindingError(entry.name);
    }
  }

  private countCapture(count: number, instances: number): void {
    if (!this.pipeline.contract.capture) return;
    const per = VERTICES_PER_PRIMITIVE[this.pipeline.state.primitive] ?? 1;
    this.capturedVertices += Math.floor(count / per) * per * instances;
  }

  private hold(resource: Resource, access: Access): void {
    resource.acquire(this, access);
    this.holds.push({ resource, access });
    this.touched.add(resource);
  }

  /** Holds every resource or none of them. */
  private holdAll(resources: readonly Resource[], access: Access): void {
    resources.forEach((resource, i) => {
      try {
        this.hold(resource, access);
      } catch (error) {
        for (const held of resources.slice(0, i)) this.unhold(held, access);
        throw error;
      }
    });
  }

  private unhold(resource: Resource, access: Access): void {
    const index = this.holds.findIndex((h) => h.resource === resource && h.access === access);
    if (index < 0) return;
    this.holds.splice(index, 1);
    resource.release(this, access);
  }

  private releaseHolds(): void {
    for (const { resource, access } of this.holds) resource.release(this, access);
    this.holds = [];
  }
}
