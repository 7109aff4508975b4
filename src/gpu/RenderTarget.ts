// RenderTarget — a framebuffer plus the formats and sample count of its
// attachments, which is what a pipeline's output interface is checked
// against when a pass begins.
//
// The default framebuffer is a RenderTarget too: its formats come from the
// context options the Device was created with, its size from the drawing
// buffer.

import type { ContextOptions } from "./config";
import type { GLContext, GLFramebuffer } from "./GLContext";
import { GL } from "./glEnums";
import type { OutputInterface } from "./PipelineBuilder";
import { Renderbuffer } from "./Renderbuffer";
import { Resource } from "./Resource";
import { TEXTURE_FORMATS, Texture, isDepthFormat, type TextureFormat } from "./Texture";

export type Attachment = Texture | Renderbuffer;

export interface RenderTargetDescriptor {
  readonly label?: string;
  readonly color: readonly Attachment[];
  readonly depth?: Attachment;
}

/** "rgba8+depth24 x1" */
export function describeOutputs(outputs: OutputInterface): string {
  const formats = [...outputs.colorFormats, ...(outputs.depthFormat ? [outputs.depthFormat] : [])];
  return `${formats.join("+") || "<no attachments>"} x${outputs.samples ?? 1}`;
}

function attachmentSamples(attachment: Attachment): number {
  return attachment instanceof Renderbuffer ? attachment.samples : 1;
}

function attach(gl: GLContext, point: number, attachment: Attachment): void {
  if (attachment instanceof Texture) {
    if (attachment.dimension !== "2d") {
      throw new RangeError(`Only 2d textures can be attached; '${attachment.label}' is ${attachment.dimension}`);
    }
    gl.framebufferTexture2D(GL.FRAMEBUFFER, point, GL.TEXTURE_2D, attachment.handle, 0);
  } else {
    gl.framebufferRenderbuffer(GL.FRAMEBUFFER, point, GL.RENDERBUFFER, attachment.handle);
  }
}

export class RenderTarget extends Resource {
  /** null for the default framebuffer. */
  readonly framebuffer: GLFramebuffer | null;
  readonly colorFormats: readonly TextureFormat[];
  readonly depthFormat: TextureFormat | undefined;
  readonly samples: number;
  readonly attachments: readonly Attachment[];
  private readonly size: () => { width: number; height: number };

  private constructor(
    gl: GLContext,
    label: string | undefined,
    framebuffer: GLFramebuffer | null,
    outputs: OutputInterface,
    attachments: readonly Attachment[],
    size: () => { width: number; height: number }
  ) {
    super(gl, "render-target", label);
    this.framebuffer = framebuffer;
    this.colorFormats = outputs.colorFormats;
    this.depthFormat = outputs.depthFormat;
    this.samples = outputs.samples ?? 1;
    this.attachments = attachments;
    this.size = size;
  }

  static defaultFramebuffer(gl: GLContext, options: ContextOptions): RenderTarget {
    const depthFormat: TextureFormat | undefined = options.stencil
      ? "depth24-stencil8"
      : options.depth
        ? "depth24"
        : undefined;
    return new RenderTarget(
      gl,
      "default-framebuffer",
      null,
      { colorFormats: ["rgba8"], depthFormat, samples: options.samples },
      [],
      () => ({ width: gl.drawingBufferWidth, height: gl.drawingBufferHeight })
    );
  }

  static create(gl: GLContext, descriptor: RenderTargetDescriptor): RenderTarget {
    const all = [...descriptor.color, ...(descriptor.depth ? [descriptor.depth] : [])];
    const first = all[0];
    if (!first) throw new RangeError("A render target needs at least one attachment");

    for (const attachment of all) {
      if (attachment.destroyed) throw new Error(`Attachment '${attachment.label}' has been destroyed`);
      if (attachment.width !== first.width || attachment.height !== first.height) {
        throw new RangeError("Render target attachments must share one size");
      }
      if (attachmentSamples(attachment) !== attachmentSamples(first)) {
        throw new RangeError("Render target attachments must share one sample count");
      }
    }
    for (const color of descriptor.color) {
      if (isDepthFormat(color.format)) {
        throw new RangeError(`Color attachment '${color.label}' has depth format ${color.format}`);
      }
    }
    if (descriptor.depth && !isDepthFormat(descriptor.depth.format)) {
      throw new RangeError(`Depth attachment '${descriptor.depth.label}' has color format ${descriptor.depth.format}`);
    }

    const framebuffer = gl.createFramebuffer();
    if (!framebuffer) throw new Error("Failed to create framebuffer");

    gl.bindFramebuffer(GL.FRAMEBUFFER, framebuffer);
    descriptor.color.forEach((attachment, i) => attach(gl, GL.COLOR_ATTACHMENT0 + i, attachment));
    if (descriptor.depth) {
      const point = TEXTURE_FORMATS[descriptor.depth.format].hasStencil
        ? GL.DEPTH_STENCIL_ATTACHMENT
        : GL.DEPTH_ATTACHMENT;
      attach(gl, point, descriptor.depth);
    }
    gl.drawBuffers(descriptor.color.map((_, i) => GL.COLOR_ATTACHMENT0 + i));
    const status = gl.checkFramebufferStatus(GL.FRAMEBUFFER);
    gl.bindFramebuffer(GL.FRAMEBUFFER, null);

    if (status !== GL.FRAMEBUFFER_COMPLETE) {
      gl.deleteFramebuffer(framebuffer);
      throw new Error(`Framebuffer incomplete: 0x${status.toString(16)}`);
    }

    return new RenderTarget(
      gl,
      descriptor.label,
      framebuffer,
      {
        colorFormats: descriptor.color.map((c) => c.format),
        depthFormat: descriptor.depth?.format,
        samples: attachmentSamples(first),
      },
      all,
      () => ({ width: first.width, height: first.height })
    );
  }

  get width(): number {
    return this.size().width;
  }

  get height(): number {
    return this.size().height;
  }

  get outputs(): OutputInterface {
    return { colorFormats: this.colorFormats, depthFormat: this.depthFormat, samples: this.samples };
  }

  /** The target and its attachments: what a pass holds to render into or blit from it. */
  get parts(): readonly Resource[] {
    return [this, ...this.attachments];
  }

  protected deleteHandle(): void {
    if (this.framebuffer) this.gl.deleteFramebuffer(this.framebuffer);
  }
}
