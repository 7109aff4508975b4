// GLContext — the slice of WebGL2RenderingContext the library calls.
//
// Context creation and capability queries stay with the caller: pass in a real
// `canvas.getContext("webgl2")` (it satisfies this interface structurally) or
// any other implementation, such as the in-process fake the tests drive.
// Handles are opaque objects; the library never looks inside them.

export type GLProgram = object;
export type GLShader = object;
export type GLBuffer = object;
export type GLTexture = object;
export type GLSampler = object;
export type GLFramebuffer = object;
export type GLRenderbuffer = object;
export type GLVertexArray = object;
export type GLTransformFeedback = object;
export type GLSync = object;
export type GLUniformLocation = object;

export interface GLActiveInfo {
  readonly name: string;
  readonly size: number;
  readonly type: number;
}

export interface GLContext {
  readonly drawingBufferWidth: number;
  readonly drawingBufferHeight: number;

  isContextLost(): boolean;
  getError(): number;
  flush(): void;

  // Shaders and programs
  createShader(type: number): GLShader | null;
  shaderSource(shader: GLShader, source: string): void;
  compileShader(shader: GLShader): void;
  getShaderParameter(shader: GLShader, pname: number): unknown;
  getShaderInfoLog(shader: GLShader): string | null;
  deleteShader(shader: GLShader | null): void;
  createProgram(): GLProgram | null;
  attachShader(program: GLProgram, shader: GLShader): void;
  transformFeedbackVaryings(program: GLProgram, varyings: string[], bufferMode: number): void;
  linkProgram(program: GLProgram): void;
  getProgramParameter(program: GLProgram, pname: number): unknown;
  getProgramInfoLog(program: GLProgram): string | null;
  deleteProgram(program: GLProgram | null): void;
  useProgram(program: GLProgram | null): void;

  // Reflection
  getActiveAttrib(program: GLProgram, index: number): GLActiveInfo | null;
  getAttribLocation(program: GLProgram, name: string): number;
  getActiveUniform(program: GLProgram, index: number): GLActiveInfo | null;
  getActiveUniforms(program: GLProgram, uniformIndices: number[], pname: number): unknown;
  getUniformLocation(program: GLProgram, name: string): GLUniformLocation | null;
  getUniform(program: GLProgram, location: GLUniformLocation): unknown;
  getActiveUniformBlockName(program: GLProgram, uniformBlockIndex: number): string | null;
  getActiveUniformBlockParameter(program: GLProgram, uniformBlockIndex: number, pname: number): unknown;
  uniformBlockBinding(program: GLProgram, uniformBlockIndex: number, uniformBlockBinding: number): void;
  getTransformFeedbackVarying(program: GLProgram, index: number): GLActiveInfo | null;

  // Default-block uniforms
  uniform1i(location: GLUniformLocation | null, x: number): void;
  uniform1fv(location: GLUniformLocation | null, data: Float32Array): void;
  uniform2fv(location: GLUniformLocation | null, data: Float32Array): void;
  uniform3fv(location: GLUniformLocation | null, data: Float32Array): void;
  uniform4fv(location: GLUniformLocation | null, data: Float32Array): void;
  uniform1iv(location: GLUniformLocation | null, data: Int32Array): void;
  uniform2iv(location: GLUniformLocation | null, data: Int32Array): void;
  uniform3iv(location: GLUniformLocation | null, data: Int32Array): void;
  uniform4iv(location: GLUniformLocation | null, data: Int32Array): void;
  uniform1uiv(location: GLUniformLocation | null, data: Uint32Array): void;
  uniform2uiv(location: GLUniformLocation | null, data: Uint32Array): void;
  uniform3uiv(location: GLUniformLocation | null, data: Uint32Array): void;
  uniform4uiv(location: GLUniformLocation | null, data: Uint32Array): void;
  uniformMatrix2fv(location: GLUniformLocation | null, transpose: boolean, data: Float32Array): void;
  uniformMatrix3fv(location: GLUniformLocation | null, transpose: boolean, data: Float32Array): void;
  uniformMatrix4fv(location: GLUniformLocation | null, transpose: boolean, data: Float32Array): void;
  uniformMatrix2x3fv(location: GLUniformLocation | null, transpose: boolean, data: Float32Array): void;
  uniformMatrix2x4fv(location: GLUniformLocation | null, transpose: boolean, data: Float32Array): void;
  uniformMatrix3x2fv(location: GLUniformLocation | null, transpose: boolean, data: Float32Array): void;
  uniformMatrix3x4fv(location: GLUniformLocation | null, transpose: boolean, data: Float32Array): void;
  uniformMatrix4x2fv(location: GLUniformLocation | null, transpose: boolean, data: Float32Array): void;
  uniformMatrix4x3fv(location: GLUniformLocation | null, transpose: boolean, data: Float32Array): void;

  // Buffers
  createBuffer(): GLBuffer | null;
  bindBuffer(target: number, buffer: GLBuffer | null): void;
  bindBufferBase(target: number, index: number, buffer: GLBuffer | null): void;
  bufferData(target: number, sizeOrData: number | ArrayBufferView, usage: number): void;
  bufferSubData(target: number, dstByteOffset: number, srcData: ArrayBufferView): void;
  getBufferSubData(target: number, srcByteOffset: number, dstBuffer: ArrayBufferView): void;
  deleteBuffer(buffer: GLBuffer | null): void;

  // Vertex input
  createVertexArray(): GLVertexArray | null;
  bindVertexArray(vertexArray: GLVertexArray | null): void;
  deleteVertexArray(vertexArray: GLVertexArray | null): void;
  enableVertexAttribArray(index: number): void;
  disableVertexAttribArray(index: number): void;
  vertexAttribPointer(index: number, size: number, type: number, normalized: boolean, stride: number, offset: number): void;
  vertexAttribIPointer(index: number, size: number, type: number, stride: number, offset: number): void;
  vertexAttribDivisor(index: number, divisor: number): void;

  // Textures and samplers
  createTexture(): GLTexture | null;
  bindTexture(target: number, texture: GLTexture | null): void;
  activeTexture(texture: number): void;
  texStorage2D(target: number, levels: number, internalformat: number, width: number, height: number): void;
  texStorage3D(target: number, levels: number, internalformat: number, width: number, height: number, depth: number): void;
  texSubImage2D(
    target: number, level: number, xoffset: number, yoffset: number,
    width: number, height: number, format: number, type: number, pixels: ArrayBufferView | null
  ): void;
  texSubImage3D(
    target: number, level: number, xoffset: number, yoffset: number, zoffset: number,
    width: number, height: number, depth: number, format: number, type: number, pixels: ArrayBufferView | null
  ): void;
  texParameteri(target: number, pname: number, param: number): void;
  deleteTexture(texture: GLTexture | null): void;
  createSampler(): GLSampler | null;
  samplerParameteri(sampler: GLSampler, pname: number, param: number): void;
  bindSampler(unit: number, sampler: GLSampler | null): void;
  deleteSampler(sampler: GLSampler | null): void;

  // Framebuffers
  createFramebuffer(): GLFramebuffer | null;
  bindFramebuffer(target: number, framebuffer: GLFramebuffer | null): void;
  framebufferTexture2D(target: number, attachment: number, textarget: number, texture: GLTexture | null, level: number): void;
  framebufferRenderbuffer(target: number, attachment: number, renderbuffertarget: number, renderbuffer: GLRenderbuffer | null): void;
  checkFramebufferStatus(target: number): number;
  drawBuffers(buffers: number[]): void;
  readBuffer(src: number): void;
  blitFramebuffer(
    srcX0: number, srcY0: number, srcX1: number, srcY1: number,
    dstX0: number, dstY0: number, dstX1: number, dstY1: number,
    mask: number, filter: number
  ): void;
  deleteFramebuffer(framebuffer: GLFramebuffer | null): void;
  createRenderbuffer(): GLRenderbuffer | null;
  bindRenderbuffer(target: number, renderbuffer: GLRenderbuffer | null): void;
  renderbufferStorageMultisample(target: number, samples: number, internalformat: number, width: number, height: number): void;
  deleteRenderbuffer(renderbuffer: GLRenderbuffer | null): void;
  readPixels(x: number, y: number, width: number, height: number, format: number, type: number, offset: number): void;

  // Drawing and fixed-function state
  viewport(x: number, y: number, width: number, height: number): void;
  clearBufferfv(buffer: number, drawbuffer: number, values: Float32Array): void;
  clearBufferiv(buffer: number, drawbuffer: number, values: Int32Array): void;
  clearBufferuiv(buffer: number, drawbuffer: number, values: Uint32Array): void;
  clearBufferfi(buffer: number, drawbuffer: number, depth: number, stencil: number): void;
  enable(cap: number): void;
  disable(cap: number): void;
  depthFunc(func: number): void;
  depthMask(flag: boolean): void;
  cullFace(mode: number): void;
  stencilFuncSeparate(face: number, func: number, ref: number, mask: number): void;
  stencilOpSeparate(face: number, fail: number, zfail: number, zpass: number): void;
  stencilMask(mask: number): void;
  blendFunc(sfactor: number, dfactor: number): void;
  drawArraysInstanced(mode: number, first: number, count: number, instanceCount: number): void;
  drawElementsInstanced(mode: number, count: number, type: number, offset: number, instanceCount: number): void;

  // Transform feedback
  createTransformFeedback(): GLTransformFeedback | null;
  bindTransformFeedback(target: number, transformFeedback: GLTransformFeedback | null): void;
  beginTransformFeedback(primitiveMode: number): void;
  endTransformFeedback(): void;
  deleteTransformFeedback(transformFeedback: GLTransformFeedback | null): void;

  // Sync objects
  fenceSync(condition: number, flags: number): GLSync | null;
  getSyncParameter(sync: GLSync, pname: number): unknown;
  deleteSync(sync: GLSync | null): void;
}
