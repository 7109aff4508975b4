// Resource — base for every GPU object the caller owns (buffers, textures,
// samplers, renderbuffers, render targets).
//
// Render passes borrow resources for their lifetime: many passes may read a
// resource at once, but a write (capture buffer, render target attachment)
// needs it exclusively. The resource keeps the borrow counts itself, so two
// independently begun passes see each other's holds.

import { ResourceBusyError } from "./errors";
import type { GLContext } from "./GLContext";

export type Access = "read" | "write";

let nextResourceId = 0;

export abstract class Resource {
  readonly label: string;
  private readers = new Map<object, number>();
  private writer: object | null = null;
  private _destroyed = false;

  protected constructor(protected gl: GLContext, kind: string, label: string | undefined) {
    this.label = label ?? `${kind}#${nextResourceId++}`;
  }

  get destroyed(): boolean {
    return this._destroyed;
  }

  /** True while any open pass holds this resource. */
  get inUse(): boolean {
    return this.writer !== null || this.readers.size > 0;
  }

  acquire(holder: object, access: Access): void {
    if (access === "write") {
      if (this.writer !== null && this.writer !== holder) {
        throw new ResourceBusyError(this.label, "written by another open pass");
      }
      if (this.readers.size > 0) {
        const selfOnly = this.readers.size === 1 && this.readers.has(holder);
        throw new ResourceBusyError(
          this.label,
          selfOnly ? "read by the pass that writes it" : "read by another open pass"
        );
      }
      this.writer = holder;
      return;
    }

    if (this.writer !== null) {
      throw new ResourceBusyError(
        this.label,
        this.writer === holder ? "written by the pass that reads it" : "written by another open pass"
      );
    }
    this.readers.set(holder, (this.readers.get(holder) ?? 0) + 1);
  }

  release(holder: object, access: Access): void {
    if (access === "write") {
      if (this.writer === holder) this.writer = null;
      return;
    }
    const count = this.readers.get(holder) ?? 0;
    if (count <= 1) this.readers.delete(holder);
    else this.readers.set(holder, count - 1);
  }

  destroy(): void {
    if (this._destroyed) return;
    if (this.inUse) throw new ResourceBusyError(this.label, "held by an open render pass");
    this._destroyed = true;
    this.deleteHandle();
  }

  protected abstract deleteHandle(): void;
}
