// Logging — module-tagged, level-filtered output through the console.
//
// Every call names the module it comes from ("Pipeline", "RenderPass",
// "Fence", ...) so output can be narrowed with setLogModules(). The level is a
// process-wide setting; Device applies the `logLevel` context option to it.

export const LOG_LEVELS = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

let currentLevel: number = LOG_LEVELS.warn;
let enabledModules: ReadonlySet<string> = new Set();

export function setLogLevel(level: LogLevel): void {
  currentLevel = LOG_LEVELS[level];
}

export function getLogLevel(): LogLevel {
  const entry = Object.entries(LOG_LEVELS).find(([, value]) => value === currentLevel);
  return entry && isLogLevel(entry[0]) ? entry[0] : "warn";
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/** Restrict output to the given modules. An empty list logs every module. */
export function setLogModules(modules: readonly string[]): void {
  enabledModules = new Set(modules.map((m) => m.toLowerCase()));
}

function shouldLog(module: string, level: number): boolean {
  if (level < currentLevel) return false;
  return enabledModules.size === 0 || enabledModules.has(module.toLowerCase());
}

function formatMessage(module: string, message: string): string {
  return `[${performance.now().toFixed(1)}ms][${module}] ${message}`;
}

type Sink = (message: string, ...rest: unknown[]) => void;

function emit(sink: Sink, module: string, message: string, data: unknown): void {
  const formatted = formatMessage(module, message);
  if (data !== undefined) {
    sink(formatted, data);
  } else {
    sink(formatted);
  }
}

export const log = {
  debug(module: string, message: string, data?: unknown): void {
    if (shouldLog(module, LOG_LEVELS.debug)) emit(console.debug, module, message, data);
  },

  info(module: string, message: string, data?: unknown): void {
    if (shouldLog(module, LOG_LEVELS.info)) emit(console.info, module, message, data);
  },

  warn(module: string, message: string, data?: unknown): void {
    if (shouldLog(module, LOG_LEVELS.warn)) emit(console.warn, module, message, data);
  },

  error(module: string, message: string, data?: unknown): void {
    if (shouldLog(module, LOG_LEVELS.error)) emit(console.error, module, message, data);
  },
};
