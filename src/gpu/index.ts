export { Device } from "./Device";
export type { PixelData, PixelRegion, RenderPassDescriptor } from "./Device";

export { ShaderProgram } from "./ShaderProgram";
export type { ShaderProgramOptions, TransformFeedbackVaryings } from "./ShaderProgram";
export { reflectProgram, assignBindingPoints } from "./ProgramReflection";
export type {
  AttributeSlot,
  ProgramInterface,
  SamplerSlot,
  UniformBlockSlot,
  UniformValueSlot,
  VaryingMode,
  VaryingSlot,
} from "./ProgramReflection";

export { VALUE_TYPES, SAMPLER_KINDS, componentCount, flattenValue } from "./valueTypes";
export type { SampleType, SamplerKind, TextureDimension, UniformInput, UniformValue, ValueType } from "./valueTypes";
export { std140Block, blockTag, UniformBlockData } from "./std140";
export type { BlockFields, BlockMember, FieldSpec, UniformBlockDescriptor, UniformBlockLayout } from "./std140";
export { vertexBuffer, vertexFormatInfo, vertexLayoutTag } from "./VertexLayout";
export type {
  StepMode,
  VertexAttributeDescriptor,
  VertexBufferLayout,
  VertexBufferOptions,
  VertexFormat,
} from "./VertexLayout";

export { buildPipeline, sampler, uniform, DEFAULT_OUTPUTS } from "./PipelineBuilder";
export type {
  BlendMode,
  BuildResult,
  CompareFunction,
  CullMode,
  DepthState,
  OutputInterface,
  PipelineDescriptor,
  PrimitiveTopology,
  ResolvedStencilState,
  SamplerDescriptor,
  SlotName,
  StencilFaceState,
  StencilOperation,
  StencilState,
  TransformFeedbackLayout,
  UniformDescriptor,
  UniformName,
  VaryingDescriptor,
} from "./PipelineBuilder";
export { Pipeline } from "./Pipeline";
export type { BindingContract, CaptureContract, ContractEntry, PipelineState, UniformEntry } from "./Pipeline";

export { Resource } from "./Resource";
export type { Access } from "./Resource";
export { Buffer } from "./Buffer";
export type { BufferDescriptor, BufferUsage, IndexFormat } from "./Buffer";
export { Texture, SampledTexture, TEXTURE_FORMATS } from "./Texture";
export type { TextureDescriptor, TextureFilter, TextureFormat, TextureRegion } from "./Texture";
export { Sampler } from "./Sampler";
export type { SamplerOptions, WrapMode } from "./Sampler";
export { Renderbuffer } from "./Renderbuffer";
export type { RenderbufferDescriptor } from "./Renderbuffer";
export { RenderTarget, describeOutputs } from "./RenderTarget";
export type { Attachment, RenderTargetDescriptor } from "./RenderTarget";

export { RenderPass } from "./RenderPass";
export type {
  Bindable,
  BlitBuffer,
  BlitFilter,
  BlitOptions,
  ClearValues,
  DrawRange,
  IndexedDrawRange,
  PassState,
  RenderPassOptions,
  Viewport,
} from "./RenderPass";
export { Fence } from "./Fence";
export type { FenceStatus } from "./Fence";

export {
  ERROR_CODES,
  GpuError,
  LinkIntrospectionError,
  BindingMismatchError,
  BindingRejectedError,
  IncompleteBindingError,
  CaptureOverflowError,
  ResourceBusyError,
  TargetMismatchError,
  PassStateError,
  IncompatibleBlitError,
  DeviceLostError,
  describeMismatch,
} from "./errors";
export type { BindingMismatch, ErrorCode, SlotCategory } from "./errors";
export { DEFAULT_CONTEXT_OPTIONS, resolveContextOptions } from "./config";
export type { ContextOptions } from "./config";
export { log, setLogLevel, getLogLevel, setLogModules } from "./log";
export type { LogLevel } from "./log";
export type { GLContext } from "./GLContext";
export { GL } from "./glEnums";
