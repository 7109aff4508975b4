// Pipeline — a program plus the BindingContract it was verified against and
// the fixed-function state its draws run with. Long-lived: build it once, then
// begin as many render passes with it as you like.
//
// The type parameters carry the slot names (S) and plain uniform names (U) of
// the descriptors it was built from, so a pass rejects unknown names at
// compile time. At run time the contract does the same by name lookup.

import type { GLUniformLocation } from "./GLContext";
import { log } from "./log";
import type {
  BlendMode,
  CullMode,
  DepthState,
  OutputInterface,
  PrimitiveTopology,
  ResolvedStencilState,
} from "./PipelineBuilder";
import type { VaryingMode } from "./ProgramReflection";
import type { ShaderProgram } from "./ShaderProgram";
import type { SamplerKind, TextureDimension, ValueType } from "./valueTypes";
import type { StepMode, VertexFormat } from "./VertexLayout";

export interface BoundAttribute {
  readonly name: string;
  readonly location: number;
  readonly format: VertexFormat;
  readonly byteOffset: number;
  readonly span: number;
}

interface EntryBase {
  readonly slot: string;
  /** Index into the pass's binding table. */
  readonly ordinal: number;
}

export interface VertexBufferEntry extends EntryBase {
  readonly category: "vertex-buffer";
  readonly tag: string;
  readonly stepMode: StepMode;
  readonly arrayStride: number;
  readonly attributes: readonly BoundAttribute[];
}

export interface UniformBlockEntry extends EntryBase {
  readonly category: "uniform-block";
  readonly tag: string;
  readonly binding: number;
  readonly byteSize: number;
}

/** One sampler element; arrays contribute `name[i]` entries. */
export interface SamplerEntry extends EntryBase {
  readonly category: "sampler";
  readonly samplerKind: SamplerKind;
  readonly dimension: TextureDimension;
  /** Texture tags this slot reads. */
  readonly accepted: ReadonlySet<string>;
  readonly unit: number;
  readonly requiresCompare: boolean;
}

export type ContractEntry = VertexBufferEntry | UniformBlockEntry | SamplerEntry;

export interface UniformEntry {
  readonly name: string;
  readonly ordinal: number;
  readonly type: ValueType;
  readonly arrayLength?: number;
  /** Total scalar count, all array elements included. */
  readonly components: number;
  readonly location: GLUniformLocation;
}

export interface CaptureContract {
  readonly mode: VaryingMode;
  readonly varyings: readonly string[];
  /** Bytes written per vertex into each capture buffer. */
  readonly bufferStrides: readonly number[];
}

export interface BindingContract {
  readonly slots: ReadonlyMap<string, ContractEntry>;
  /** Entries a draw needs bound, by ordinal. */
  readonly required: readonly ContractEntry[];
  readonly uniforms: ReadonlyMap<string, UniformEntry>;
  readonly capture: CaptureContract | null;
  /** null for capture-only pipelines. */
  readonly outputs: OutputInterface | null;
  /** Descriptor names that matched nothing in the program. */
  readonly ignored: ReadonlySet<string>;
}

export interface PipelineState {
  readonly primitive: PrimitiveTopology;
  readonly depth: DepthState | null;
  readonly stencil: ResolvedStencilState | null;
  readonly cullMode: CullMode;
  readonly blend: BlendMode;
}

export class Pipeline<S extends string = string, U extends string = string> {
  private released = false;

  constructor(
    readonly program: ShaderProgram,
    readonly contract: BindingContract,
    readonly state: PipelineState,
    readonly label: string
  ) {}

  /** Released explicitly, or implicitly with its program. */
  get isReleased(): boolean {
    return this.released || this.program.destroyed;
  }

  entry(slot: S): ContractEntry | undefined {
    return this.contract.slots.get(slot);
  }

  release(): void {
    if (this.released) return;
    this.released = true;
    log.debug("Pipeline", `Released '${this.label}'`);
  }
}
