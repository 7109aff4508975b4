import { afterEach, describe, expect, it, vi } from "vitest";

import { DeviceLostError } from "../../src/gpu/errors";
import { Fence, FenceQueue } from "../../src/gpu/Fence";
import { GL } from "../../src/gpu/glEnums";
import { setLogLevel } from "../../src/gpu/log";
import { FakeGL } from "../support/FakeGL";

function syncFor(gl: FakeGL): object {
  const sync = gl.fenceSync(GL.SYNC_GPU_COMMANDS_COMPLETE, 0);
  if (!sync) throw new Error("no sync");
  return sync;
}

describe("gpu/Fence", () => {
  afterEach(() => {
    vi.useRealTimers();
    setLogLevel("warn");
  });

  describe("Fence", () => {
    it("resolves waiters once signaled", async () => {
      const fence = new Fence("f");
      const waiting = fence.wait();

      fence.signal();

      await expect(waiting).resolves.toBe("signaled");
      expect(fence.status).toBe("signaled");
      expect(fence.wait()).toBe(waiting);
    });

    it("resolves a wait that starts after the signal", async () => {
      const fence = new Fence("f");
      fence.signal();

      await expect(fence.wait()).resolves.toBe("signaled");
    });

    it("rejects with the device-lost error", async () => {
      const fence = new Fence("f");
      fence.fail(new DeviceLostError("context lost"));

      expect(fence.status).toBe("lost");
      await expect(fence.wait()).rejects.toThrow("Device lost: context lost");
    });

    it("transitions only once", () => {
      const fence = new Fence("f");
      fence.signal();
      fence.fail(new DeviceLostError("late"));

      expect(fence.status).toBe("signaled");
    });
  });

  describe("FenceQueue", () => {
    it("signals completed fences oldest first and stops at the first pending one", () => {
      const gl = new FakeGL();
      const queue = new FenceQueue(gl, 1, () => undefined);
      const first = new Fence("first");
      const second = new Fence("second");
      queue.enqueue(first, syncFor(gl));
      queue.enqueue(second, syncFor(gl));

      gl.syncs[1].signaled = true;
      queue.poll();
      expect([first.status, second.status]).toEqual(["pending", "pending"]);

      gl.syncs[0].signaled = true;
      queue.poll();
      expect([first.status, second.status]).toEqual(["signaled", "signaled"]);
      expect(queue.size).toBe(0);
      expect(gl.callsTo("deleteSync")).toHaveLength(2);
      queue.stop();
    });

    it("polls on a timer while fences are pending", () => {
      vi.useFakeTimers();
      const gl = new FakeGL();
      const queue = new FenceQueue(gl, 5, () => undefined);
      const fence = new Fence("timed");
      queue.enqueue(fence, syncFor(gl));
      gl.signalFences();

      vi.advanceTimersByTime(4);
      expect(fence.status).toBe("pending");

      vi.advanceTimersByTime(1);
      expect(fence.status).toBe("signaled");
      expect(vi.getTimerCount()).toBe(0);
    });

    it("reports a lost context instead of polling", () => {
      const gl = new FakeGL();
      const onContextLost = vi.fn();
      const queue = new FenceQueue(gl, 1, onContextLost);
      queue.enqueue(new Fence("f"), syncFor(gl));
      gl.contextLost = true;

      queue.poll();

      expect(onContextLost).toHaveBeenCalledTimes(1);
      queue.stop();
    });

    it("fails everything pending", async () => {
      setLogLevel("silent");
      const gl = new FakeGL();
      const queue = new FenceQueue(gl, 1, () => undefined);
      const fences = [new Fence("a"), new Fence("b")];
      for (const fence of fences) queue.enqueue(fence, syncFor(gl));

      queue.failAll(new DeviceLostError("out of memory"));

      expect(fences.map((f) => f.status)).toEqual(["lost", "lost"]);
      expect(queue.size).toBe(0);
      await expect(fences[0].wait()).rejects.toBeInstanceOf(DeviceLostError);
    });
  });
});
