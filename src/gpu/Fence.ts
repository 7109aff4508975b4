// Fence — one-shot completion token returned by Device.submit().
//
//   pending ──▶ signaled   (the GPU finished everything submitted before it)
//      └──────▶ lost       (the context was lost; wait() rejects)
//
// A fence transitions at most once. wait() can be called any number of
// times; once settled it returns the same settled promise. Dropping a fence
// only drops the observer: the submitted work still runs.
//
// FenceQueue drives fences from GL sync objects. While anything is pending it
// polls getSyncParameter(SYNC_STATUS) on a timer, oldest first, and never
// blocks the thread (no clientWaitSync).

import type { DeviceLostError } from "./errors";
import type { GLContext, GLSync } from "./GLContext";
import { GL } from "./glEnums";
import { log } from "./log";

export type FenceStatus = "pending" | "signaled" | "lost";

export class Fence {
  private _status: FenceStatus = "pending";
  private error: DeviceLostError | null = null;
  private promise: Promise<"signaled"> | null = null;
  private settle: { resolve: (value: "signaled") => void; reject: (error: DeviceLostError) => void } | null = null;

  constructor(readonly label: string) {}

  get status(): FenceStatus {
    return this._status;
  }

  /**
   * Resolves with "signaled" once the GPU has finished the submitted work,
   * or rejects with DeviceLostError. The promise is only created when
   * someone waits, so an unobserved lost fence raises no unhandled rejection.
   */
  wait(): Promise<"signaled"> {
    if (!this.promise) {
      this.promise = new Promise<"signaled">((resolve, reject) => {
        if (this._status === "signaled") resolve("signaled");
        else if (this._status === "lost") reject(this.error);
        else this.settle = { resolve, reject };
      });
    }
    return this.promise;
  }

  /** @internal */
  signal(): void {
    if (this._status !== "pending") return;
    this._status = "signaled";
    this.settle?.resolve("signaled");
    this.settle = null;
  }

  /** @internal */
  fail(error: DeviceLostError): void {
    if (this._status !== "pending") return;
    this._status = "lost";
    this.error = error;
    this.settle?.reject(error);
    this.settle = null;
  }
}

interface PendingFence {
  readonly fence: Fence;
  readonly sync: GLSync;
}

export class FenceQueue {
  private pending: PendingFence[] = [];
  private timer: ReturnType<typeof setTimeout> | null = null;

  constructor(
    private gl: GLContext,
    private pollIntervalMs: number,
    private onContextLost: () => void
  ) {}

  get size(): number {
    return this.pending.length;
  }

  enqueue(fence: Fence, sync: GLSync): void {
    this.pending.push({ fence, sync });
    this.schedule();
  }

  /** Checks sync objects now, signaling every completed fence in order. */
  poll(): void {
    if (this.gl.isContextLost()) {
      this.onContextLost();
      return;
    }

    // Work completes in submission order, so stop at the first fence that is
    // still pending.
    while (this.pending.length > 0) {
      const { fence, sync } = this.pending[0];
      if (this.gl.getSyncParameter(sync, GL.SYNC_STATUS) !== GL.SIGNALED) break;
      this.pending.shift();
      this.gl.deleteSync(sync);
      fence.signal();
      log.debug("Fence", `Signaled '${fence.label}'`);
    }
    this.schedule();
  }

  /** Fails every pending fence and stops polling. */
  failAll(error: DeviceLostError): void {
    this.stop();
    const pending = this.pending;
    this.pending = [];
    for (const { fence } of pending) fence.fail(error);
    if (pending.length > 0) log.warn("Fence", `${pending.length} pending fence(s) lost: ${error.message}`);
  }

  stop(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private schedule(): void {
    if (this.timer !== null || this.pending.length === 0) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.poll();
    }, this.pollIntervalMs);
  }
}
