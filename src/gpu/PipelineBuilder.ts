// PipelineBuilder — matches a program's reflected interface against the
// caller's layout descriptors and, when every active slot is satisfied,
// produces a Pipeline holding the verified BindingContract.
//
// This is the one place structural comparison happens. Everything later (bind,
// draw) compares precomputed layout tags, so the cost here is paid once per
// (program, descriptor set) pair. The function is pure: it reads the cached
// ProgramInterface, writes nothing to the context and returns either the
// pipeline or the first mismatch found.
//
// Only slots the driver reports as active are required. A descriptor that
// targets nothing in the program is recorded as ignored, so one descriptor set
// can serve several shader variants.

import type { BindingMismatch } from "./errors";
import {
  Pipeline,
  type BindingContract,
  type BoundAttribute,
  type CaptureContract,
  type ContractEntry,
  type PipelineState,
  type UniformEntry,
} from "./Pipeline";
import type { ProgramInterface, VaryingMode } from "./ProgramReflection";
import type { ShaderProgram } from "./ShaderProgram";
import { blockTag, describeMember, type UniformBlockDescriptor } from "./std140";
import type { TextureFormat } from "./Texture";
import {
  SAMPLER_KINDS,
  VALUE_TYPES,
  acceptedTextureTags,
  componentCount,
  type SamplerKind,
  type ValueType,
} from "./valueTypes";
import {
  vertexFormatInfo,
  vertexLayoutTag,
  type VertexAttributeLayout,
  type VertexBufferLayout,
} from "./VertexLayout";

export interface SamplerDescriptor<N extends string = string> {
  readonly name: N;
  readonly kind: SamplerKind;
  /** Expected first texture unit; checked against reflection when given. */
  readonly unit?: number;
}

export interface UniformDescriptor<N extends string = string> {
  readonly name: N;
  readonly type: ValueType;
  readonly arrayLength?: number;
}

export interface VaryingDescriptor {
  readonly name: string;
  readonly type: ValueType;
  readonly arrayLength?: number;
}

export interface TransformFeedbackLayout {
  readonly mode: VaryingMode;
  /** In capture order. */
  readonly varyings: readonly VaryingDescriptor[];
}

export interface OutputInterface {
  readonly colorFormats: readonly TextureFormat[];
  readonly depthFormat?: TextureFormat;
  /** Defaults to 1. */
  readonly samples?: number;
}

export type PrimitiveTopology =
  | "points"
  | "lines"
  | "line-strip"
  | "line-loop"
  | "triangles"
  | "triangle-strip"
  | "triangle-fan";

export type CompareFunction =
  | "never"
  | "less"
  | "equal"
  | "less-equal"
  | "greater"
  | "not-equal"
  | "greater-equal"
  | "always";

export interface DepthState {
  readonly compare: CompareFunction;
  readonly write: boolean;
}

export type StencilOperation =
  | "keep"
  | "zero"
  | "replace"
  | "increment"
  | "increment-wrap"
  | "decrement"
  | "decrement-wrap"
  | "invert";

export interface StencilFaceState {
  readonly compare: CompareFunction;
  /** Stencil test failed. */
  readonly fail: StencilOperation;
  /** Stencil test passed, depth test failed. */
  readonly depthFail: StencilOperation;
  /** Both tests passed. */
  readonly pass: StencilOperation;
}

/**
 * Stencil test. Back faces use the front state unless `back` is given. Masks
 * default to 0xff; the reference to 0. Targets without a stencil attachment
 * render as if the test were off.
 */
export interface StencilState {
  readonly front: StencilFaceState;
  readonly back?: StencilFaceState;
  readonly reference?: number;
  readonly readMask?: number;
  readonly writeMask?: number;
}

/** StencilState with every default filled in. */
export interface ResolvedStencilState {
  readonly front: StencilFaceState;
  readonly back: StencilFaceState;
  readonly reference: number;
  readonly readMask: number;
  readonly writeMask: number;
}

export type CullMode = "none" | "front" | "back";

export type BlendMode = "none" | "alpha" | "additive" | "premultiplied";

export interface PipelineDescriptor {
  readonly label?: string;
  readonly vertexBuffers?: readonly VertexBufferLayout[];
  readonly uniformBlocks?: readonly UniformBlockDescriptor[];
  readonly samplers?: readonly SamplerDescriptor[];
  readonly uniforms?: readonly UniformDescriptor[];
  readonly transformFeedback?: TransformFeedbackLayout;
  /**
   * Attachments the pipeline renders into. Omitted means a single rgba8
   * color target; null means nothing is rasterized (capture-only pipelines).
   */
  readonly outputs?: OutputInterface | null;
  readonly primitive?: PrimitiveTopology;
  readonly depth?: DepthState;
  readonly stencil?: StencilState;
  readonly cullMode?: CullMode;
  readonly blend?: BlendMode;
}

export const DEFAULT_OUTPUTS: OutputInterface = { colorFormats: ["rgba8"], samples: 1 };

type NamesOf<T> = T extends readonly { readonly name: infer N extends string }[] ? N : never;

/** Slot names a pipeline built from D accepts in `pass.bind`. */
export type SlotName<D extends PipelineDescriptor> =
  | NamesOf<D["vertexBuffers"]>
  | NamesOf<D["uniformBlocks"]>
  | NamesOf<D["samplers"]>
  | `${NamesOf<D["samplers"]>}[${number}]`;

/** Plain uniform names a pipeline built from D accepts in `pass.setUniform`. */
export type UniformName<D extends PipelineDescriptor> = NamesOf<D["uniforms"]>;

export type BuildResult<S extends string = string, U extends string = string> =
  | { readonly ok: true; readonly pipeline: Pipeline<S, U> }
  | { readonly ok: false; readonly mismatch: BindingMismatch };

export function sampler<N extends string>(name: N, kind: SamplerKind, options: { unit?: number } = {}): SamplerDescriptor<N> {
  return Object.freeze({ name, kind, unit: options.unit });
}

export function uniform<N extends string>(
  name: N,
  type: ValueType,
  options: { arrayLength?: number } = {}
): UniformDescriptor<N> {
  return Object.freeze({ name, type, arrayLength: options.arrayLength });
}

export function describeType(type: ValueType, arrayLength?: number): string {
  return arrayLength !== undefined ? `${type}[${arrayLength}]` : type;
}

const CAPTURE_PRIMITIVES: readonly PrimitiveTopology[] = ["points", "lines", "triangles"];

// Thrown out of the matching passes and turned into a BuildResult at the top.
class Mismatch {
  constructor(readonly mismatch: BindingMismatch) {}
}

function fail(mismatch: BindingMismatch): never {
  throw new Mismatch(mismatch);
}

function checkUnique(names: Iterable<string>, seen: Set<string>): void {
  for (const name of names) {
    if (seen.has(name)) fail({ kind: "duplicate-binding", slot: name });
    seen.add(name);
  }
}

function checkDuplicates(descriptor: PipelineDescriptor): void {
  // Slot names share one namespace since pass.bind() takes a bare name.
  const slots = new Set<string>();
  checkUnique((descriptor.vertexBuffers ?? []).map((b) => b.name), slots);
  checkUnique((descriptor.uniformBlocks ?? []).map((b) => b.name), slots);
  checkUnique((descriptor.samplers ?? []).map((s) => s.name), slots);
  checkUnique((descriptor.uniforms ?? []).map((u) => u.name), new Set());
  checkUnique(
    (descriptor.vertexBuffers ?? []).flatMap((b) => b.attributes.map((a) => a.name)),
    new Set()
  );
  checkUnique((descriptor.transformFeedback?.varyings ?? []).map((v) => v.name), new Set());
}

interface SlotCollector {
  readonly entries: ContractEntry[];
  readonly ignored: Set<string>;
}

function matchVertexBuffers(iface: ProgramInterface, buffers: readonly VertexBufferLayout[], out: SlotCollector): void {
  const byAttribute = new Map<string, { buffer: VertexBufferLayout; attribute: VertexAttributeLayout }>();
  for (const buffer of buffers) {
    for (const attribute of buffer.attributes) byAttribute.set(attribute.name, { buffer, attribute });
  }

  const boundByBuffer = new Map<string, BoundAttribute[]>();
  for (const slot of iface.attributes) {
    const match = byAttribute.get(slot.name);
    if (!match) fail({ kind: "missing-binding", slot: slot.name, category: "attribute" });
    const { buffer, attribute } = match;

    const expected = VALUE_TYPES[slot.type];
    const format = vertexFormatInfo(attribute.format);
    const span = expected.columns * slot.arraySize;
    if (
      format.shaderScalar !== expected.scalar ||
      format.components !== expected.rows ||
      attribute.span !== span
    ) {
      fail({
        kind: "type-mismatch",
        slot: slot.name,
        expected: describeType(slot.type, slot.arraySize > 1 ? slot.arraySize : undefined),
        actual: attribute.span > 1 ? `${attribute.format} x${attribute.span}` : attribute.format,
      });
    }
    if (attribute.location !== undefined && attribute.location !== slot.location) {
      fail({
        kind: "layout-mismatch",
        slot: slot.name,
        expected: `location ${slot.location}`,
        actual: `location ${attribute.location}`,
      });
    }

    const bound = boundByBuffer.get(buffer.name) ?? [];
    bound.push({
      name: slot.name,
      location: slot.location,
      format: attribute.format,
      byteOffset: attribute.byteOffset,
      span,
    });
    boundByBuffer.set(buffer.name, bound);
  }

  for (const buffer of buffers) {
    const attributes = boundByBuffer.get(buffer.name);
    if (!attributes) {
      out.ignored.add(buffer.name);
      continue;
    }
    out.entries.push({
      category: "vertex-buffer",
      slot: buffer.name,
      ordinal: out.entries.length,
      tag: vertexLayoutTag(buffer),
      stepMode: buffer.stepMode,
      arrayStride: buffer.arrayStride,
      attributes,
    });
  }
}

function matchUniformBlocks(iface: ProgramInterface, blocks: readonly UniformBlockDescriptor[], out: SlotCollector): void {
  const byName = new Map(blocks.map((b) => [b.name, b]));

  for (const slot of iface.uniformBlocks) {
    const block = byName.get(slot.name);
    if (!block) fail({ kind: "missing-binding", slot: slot.name, category: "uniform-block" });

    const count = Math.max(slot.members.length, block.members.length);
    for (let i = 0; i < count; i++) {
      const expected = slot.members[i];
      const actual = block.members[i];
      const expectedText = expected ? describeMember(expected) : "<none>";
      const actualText = actual ? describeMember(actual) : "<none>";
      if (expectedText !== actualText) {
        fail({ kind: "layout-mismatch", slot: slot.name, expected: expectedText, actual: actualText });
      }
    }
    if (block.byteSize !== slot.byteSize) {
      fail({
        kind: "layout-mismatch",
        slot: slot.name,
        expected: `${slot.byteSize} bytes`,
        actual: `${block.byteSize} bytes`,
      });
    }

    out.entries.push({
      category: "uniform-block",
      slot: slot.name,
      ordinal: out.entries.length,
      tag: blockTag(block),
      binding: slot.binding,
      byteSize: slot.byteSize,
    });
    byName.delete(slot.name);
  }

  for (const name of byName.keys()) out.ignored.add(name);
}

function matchSamplers(iface: ProgramInterface, samplers: readonly SamplerDescriptor[], out: SlotCollector): void {
  const byName = new Map(samplers.map((s) => [s.name, s]));

  for (const slot of iface.samplers) {
    const descriptor = byName.get(slot.name);
    if (!descriptor) fail({ kind: "missing-binding", slot: slot.name, category: "sampler" });
    if (descriptor.kind !== slot.kind) {
      fail({ kind: "type-mismatch", slot: slot.name, expected: slot.kind, actual: descriptor.kind });
    }
    if (descriptor.unit !== undefined && descriptor.unit !== slot.units[0]) {
      fail({
        kind: "layout-mismatch",
        slot: slot.name,
        expected: `unit ${slot.units[0]}`,
        actual: `unit ${descriptor.unit}`,
      });
    }

    const { dimension, sampleType } = SAMPLER_KINDS[slot.kind];
    const accepted = acceptedTextureTags(slot.kind);
    slot.units.forEach((unit, element) => {
      out.entries.push({
        category: "sampler",
        slot: slot.isArray ? `${slot.name}[${element}]` : slot.name,
        ordinal: out.entries.length,
        samplerKind: slot.kind,
        dimension,
        accepted,
        unit,
        requiresCompare: sampleType === "depth",
      });
    });
    byName.delete(slot.name);
  }

  for (const name of byName.keys()) out.ignored.add(name);
}

function matchUniforms(iface: ProgramInterface, uniforms: readonly UniformDescriptor[], ignored: Set<string>): UniformEntry[] {
  const byName = new Map(uniforms.map((u) => [u.name, u]));
  const entries: UniformEntry[] = [];

  for (const slot of iface.uniforms) {
    const descriptor = byName.get(slot.name);
    if (!descriptor) fail({ kind: "missing-binding", slot: slot.name, category: "uniform" });
    if (descriptor.type !== slot.type || descriptor.arrayLength !== slot.arrayLength) {
      fail({
        kind: "type-mismatch",
        slot: slot.name,
        expected: describeType(slot.type, slot.arrayLength),
        actual: describeType(descriptor.type, descriptor.arrayLength),
      });
    }
    entries.push({
      name: slot.name,
      ordinal: entries.length,
      type: slot.type,
      arrayLength: slot.arrayLength,
      components: componentCount(slot.type) * (slot.arrayLength ?? 1),
      location: slot.location,
    });
    byName.delete(slot.name);
  }

  for (const name of byName.keys()) ignored.add(name);
  return entries;
}

function matchTransformFeedback(
  iface: ProgramInterface,
  layout: TransformFeedbackLayout | undefined,
  primitive: PrimitiveTopology
): CaptureContract | null {
  if (iface.varyingMode === null || iface.varyings.length === 0) return null;
  if (!layout) {
    fail({ kind: "missing-binding", slot: iface.varyings[0].name, category: "varying" });
  }
  if (layout.mode !== iface.varyingMode) {
    fail({ kind: "layout-mismatch", slot: "transformFeedback", expected: iface.varyingMode, actual: layout.mode });
  }

  const count = Math.max(iface.varyings.length, layout.varyings.length);
  for (let i = 0; i < count; i++) {
    const expected = iface.varyings[i];
    const actual = layout.varyings[i];
    if (!expected || !actual || expected.name !== actual.name) {
      fail({
        kind: "layout-mismatch",
        slot: expected?.name ?? actual?.name ?? "transformFeedback",
        expected: `varying ${i} ${expected?.name ?? "<none>"}`,
        actual: `varying ${i} ${actual?.name ?? "<none>"}`,
      });
    }
    const expectedArray = expected.arraySize > 1 ? expected.arraySize : undefined;
    if (expected.type !== actual.type || expectedArray !== actual.arrayLength) {
      fail({
        kind: "type-mismatch",
        slot: expected.name,
        expected: describeType(expected.type, expectedArray),
        actual: describeType(actual.type, actual.arrayLength),
      });
    }
  }

  if (!CAPTURE_PRIMITIVES.includes(primitive)) {
    fail({ kind: "layout-mismatch", slot: "primitive", expected: CAPTURE_PRIMITIVES.join(" | "), actual: primitive });
  }

  // Every GLSL scalar captures as 4 bytes.
  const strides = iface.varyings.map((v) => componentCount(v.type) * v.arraySize * 4);
  return {
    mode: iface.varyingMode,
    varyings: iface.varyings.map((v) => v.name),
    bufferStrides: iface.varyingMode === "interleaved" ? [strides.reduce((a, b) => a + b, 0)] : strides,
  };
}

function resolveStencil(stencil: StencilState | undefined): ResolvedStencilState | null {
  if (!stencil) return null;
  const reference = stencil.reference ?? 0;
  const readMask = stencil.readMask ?? 0xff;
  const writeMask = stencil.writeMask ?? 0xff;
  for (const [name, value] of [["reference", reference], ["readMask", readMask], ["writeMask", writeMask]] as const) {
    if (!Number.isInteger(value) || value < 0 || value > 0xff) {
      throw new RangeError(`Stencil ${name} must be an integer in 0..255, got ${value}`);
    }
  }
  return { front: stencil.front, back: stencil.back ?? stencil.front, reference, readMask, writeMask };
}

function fixedFunctionState(descriptor: PipelineDescriptor): PipelineState {
  return {
    primitive: descriptor.primitive ?? "triangles",
    depth: descriptor.depth ?? null,
    stencil: resolveStencil(descriptor.stencil),
    cullMode: descriptor.cullMode ?? "none",
    blend: descriptor.blend ?? "none",
  };
}

/**
 * Checks `descriptor` against `program`'s reflected interface. Returns the
 * first mismatch instead of throwing; LinkIntrospectionError from reflection
 * still propagates.
 */
export function buildPipeline<D extends PipelineDescriptor>(
  program: ShaderProgram,
  descriptor: D
): BuildResult<SlotName<D>, UniformName<D>> {
  const iface = program.interface;
  const state = fixedFunctionState(descriptor);
  const outputs = descriptor.outputs === undefined ? DEFAULT_OUTPUTS : descriptor.outputs;

  try {
    checkDuplicates(descriptor);

    const collector: SlotCollector = { entries: [], ignored: new Set() };
    matchVertexBuffers(iface, descriptor.vertexBuffers ?? [], collector);
    matchUniformBlocks(iface, descriptor.uniformBlocks ?? [], collector);
    matchSamplers(iface, descriptor.samplers ?? [], collector);
    const uniforms = matchUniforms(iface, descriptor.uniforms ?? [], collector.ignored);
    const capture = matchTransformFeedback(iface, descriptor.transformFeedback, state.primitive);

    if (outputs === null && capture === null) {
      fail({ kind: "missing-binding", slot: "outputs", category: "output" });
    }

    const contract: BindingContract = {
      slots: new Map(collector.entries.map((e) => [e.slot, e])),
      required: collector.entries,
      uniforms: new Map(uniforms.map((u) => [u.name, u])),
      capture,
      outputs,
      ignored: collector.ignored,
    };
    return {
      ok: true,
      pipeline: new Pipeline<SlotName<D>, UniformName<D>>(program, contract, state, descriptor.label ?? program.label),
    };
  } catch (error) {
    if (error instanceof Mismatch) return { ok: false, mismatch: error.mismatch };
    throw error;
  }
}

