// ContextOptions — settings a Device is created with. The context itself is
// created by the caller; these options describe its default framebuffer (so
// pipelines can be checked against it) and tune submission.

import { isLogLevel, type LogLevel } from "./log";

export interface ContextOptions {
  /** The default framebuffer has a depth buffer. */
  readonly depth: boolean;
  /** The default framebuffer has a stencil buffer (implies depth). */
  readonly stencil: boolean;
  /** Sample count of the default framebuffer. */
  readonly samples: number;
  /** Delay between sync-object polls while fences are pending. */
  readonly fencePollIntervalMs: number;
  /** Query getError() after each submit and escalate device-level errors. */
  readonly checkErrors: boolean;
  readonly logLevel: LogLevel;
}

export const DEFAULT_CONTEXT_OPTIONS: ContextOptions = {
  depth: false,
  stencil: false,
  samples: 1,
  fencePollIntervalMs: 1,
  checkErrors: true,
  logLevel: "warn",
};

export function resolveContextOptions(overrides: Partial<ContextOptions> = {}): ContextOptions {
  const options: ContextOptions = { ...DEFAULT_CONTEXT_OPTIONS, ...overrides };

  if (!Number.isInteger(options.samples) || options.samples < 1) {
    throw new RangeError(`samples must be a positive integer, got ${options.samples}`);
  }
  if (!Number.isFinite(options.fencePollIntervalMs) || options.fencePollIntervalMs < 0) {
    throw new RangeError(`fencePollIntervalMs must be a non-negative number, got ${options.fencePollIntervalMs}`);
  }
  if (!isLogLevel(options.logLevel)) {
    throw new RangeError(`Unknown log level '${String(options.logLevel)}'`);
  }
  return options;
}
