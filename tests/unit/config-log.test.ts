import { afterEach, describe, expect, it, vi } from "vitest";

import { DEFAULT_CONTEXT_OPTIONS, resolveContextOptions } from "../../src/gpu/config";
import { Device } from "../../src/gpu/Device";
import {
  BindingMismatchError,
  BindingRejectedError,
  DeviceLostError,
  GpuError,
  describeMismatch,
} from "../../src/gpu/errors";
import { getLogLevel, isLogLevel, log, setLogLevel, setLogModules } from "../../src/gpu/log";
import { FakeGL } from "../support/FakeGL";
import { QUAD_PROGRAM, compileProgram, vertices } from "../support/programs";

describe("gpu/config", () => {
  it("fills in defaults", () => {
    expect(resolveContextOptions()).toEqual(DEFAULT_CONTEXT_OPTIONS);
    expect(resolveContextOptions({ samples: 4, depth: true })).toEqual({
      ...DEFAULT_CONTEXT_OPTIONS,
      samples: 4,
      depth: true,
    });
  });

  it("rejects invalid values", () => {
    expect(() => resolveContextOptions({ samples: 0 })).toThrow("samples must be a positive integer, got 0");
    expect(() => resolveContextOptions({ samples: 1.5 })).toThrow(RangeError);
    expect(() => resolveContextOptions({ fencePollIntervalMs: -1 })).toThrow(
      "fencePollIntervalMs must be a non-negative number, got -1"
    );
  });
});

describe("gpu/log", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    setLogLevel("warn");
    setLogModules([]);
  });

  it("prefixes messages with a timestamp and the module", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    setLogLevel("info");

    log.info("Device", "hello");

    expect(info).toHaveBeenCalledWith(expect.stringMatching(/^\[\d+\.\dms\]\[Device\] hello$/));
  });

  it("passes extra data through", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    log.warn("Fence", "slow", { pending: 3 });

    expect(warn).toHaveBeenCalledWith(expect.stringContaining("[Fence] slow"), { pending: 3 });
  });

  it("drops messages below the level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    setLogLevel("error");

    log.debug("RenderPass", "quiet");
    log.error("RenderPass", "loud");

    expect(getLogLevel()).toBe("error");
    expect(debug).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(1);
  });

  it("narrows output to the selected modules", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    setLogModules(["FENCE"]);

    log.warn("Device", "skipped");
    log.warn("Fence", "kept");

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(expect.stringContaining("[Fence] kept"));
  });

  it("recognizes level names", () => {
    expect(isLogLevel("silent")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
  });

  it("takes the level from the device options", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);

    Device.create(new FakeGL(), { logLevel: "info" });

    expect(getLogLevel()).toBe("info");
    expect(info).toHaveBeenCalledWith(expect.stringMatching(/\[Device\] Created \(4x4, rgba8, x1\)$/));
  });

  it("warns when a pipeline is rejected", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const gl = new FakeGL();
    const device = Device.create(gl, { logLevel: "warn" });

    const result = device.tryCreatePipeline(compileProgram(gl, QUAD_PROGRAM, { label: "quad" }), {
      vertexBuffers: [vertices],
    });

    expect(result.ok).toBe(false);
    expect(warn).toHaveBeenCalledWith(
      expect.stringMatching(/\[Pipeline\] 'quad' rejected: no descriptor supplies uniform-block 'Globals'$/)
    );
  });
});

describe("gpu/errors", () => {
  it("describes every mismatch kind", () => {
    expect(describeMismatch({ kind: "missing-binding", slot: "uv", category: "attribute" })).toBe(
      "no descriptor supplies attribute 'uv'"
    );
    expect(describeMismatch({ kind: "layout-mismatch", slot: "Globals", expected: "a", actual: "b" })).toBe(
      "layout of 'Globals' differs: program expects a, descriptor declares b"
    );
    expect(describeMismatch({ kind: "type-mismatch", slot: "time", expected: "float", actual: "vec2" })).toBe(
      "type of 'time' differs: program expects float, descriptor declares vec2"
    );
    expect(describeMismatch({ kind: "duplicate-binding", slot: "vertices" })).toBe(
      "more than one descriptor targets 'vertices'"
    );
  });

  it("carries stable codes", () => {
    const errors = [
      new BindingMismatchError({ kind: "duplicate-binding", slot: "x" }),
      new BindingRejectedError("x", "no"),
      new DeviceLostError("gone"),
    ];

    expect(errors.every((e) => e instanceof GpuError)).toBe(true);
    expect(errors.map((e) => [e.name, e.code])).toEqual([
      ["BindingMismatchError", "GL_BINDING_MISMATCH"],
      ["BindingRejectedError", "GL_BINDING_REJECTED"],
      ["DeviceLostError", "GL_DEVICE_LOST"],
    ]);
    expect(errors[0].message).toBe("more than one descriptor targets 'x'");
  });
});
