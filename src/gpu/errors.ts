// Error taxonomy. Every error the library raises extends GpuError and carries
// a stable `code`, so callers can branch on codes instead of message text.
//
//   construction time  LinkIntrospectionError, BindingMismatchError
//   pass recording     BindingRejectedError, IncompleteBindingError,
//                      CaptureOverflowError, ResourceBusyError,
//                      TargetMismatchError, PassStateError,
//                      IncompatibleBlitError
//   device             DeviceLostError

export const ERROR_CODES = {
  LINK_INTROSPECTION: "GL_LINK_INTROSPECTION",
  BINDING_MISMATCH: "GL_BINDING_MISMATCH",
  BINDING_REJECTED: "GL_BINDING_REJECTED",
  INCOMPLETE_BINDING: "GL_INCOMPLETE_BINDING",
  CAPTURE_OVERFLOW: "GL_CAPTURE_OVERFLOW",
  RESOURCE_BUSY: "GL_RESOURCE_BUSY",
  TARGET_MISMATCH: "GL_TARGET_MISMATCH",
  PASS_STATE: "GL_PASS_STATE",
  INCOMPATIBLE_BLIT: "GL_INCOMPATIBLE_BLIT",
  DEVICE_LOST: "GL_DEVICE_LOST",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export type SlotCategory =
  | "attribute"
  | "uniform-block"
  | "sampler"
  | "uniform"
  | "varying"
  | "output";

/** Why a descriptor set does not satisfy a program's interface. */
export type BindingMismatch =
  | { readonly kind: "missing-binding"; readonly slot: string; readonly category: SlotCategory }
  | { readonly kind: "layout-mismatch"; readonly slot: string; readonly expected: string; readonly actual: string }
  | { readonly kind: "type-mismatch"; readonly slot: string; readonly expected: string; readonly actual: string }
  | { readonly kind: "duplicate-binding"; readonly slot: string };

export function describeMismatch(mismatch: BindingMismatch): string {
  switch (mismatch.kind) {
    case "missing-binding":
      return `no descriptor supplies ${mismatch.category} '${mismatch.slot}'`;
    case "layout-mismatch":
      return `layout of '${mismatch.slot}' differs: program expects ${mismatch.expected}, descriptor declares ${mismatch.actual}`;
    case "type-mismatch":
      return `type of '${mismatch.slot}' differs: program expects ${mismatch.expected}, descriptor declares ${mismatch.actual}`;
    case "duplicate-binding":
      return `more than one descriptor targets '${mismatch.slot}'`;
  }
}

export class GpuError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = "GpuError";
    this.code = code;
  }
}

export class LinkIntrospectionError extends GpuError {
  readonly infoLog: string;

  constructor(message: string, infoLog = "") {
    super(ERROR_CODES.LINK_INTROSPECTION, infoLog ? `${message}:\n${infoLog}` : message);
    this.name = "LinkIntrospectionError";
    this.infoLog = infoLog;
  }
}

export class BindingMismatchError extends GpuError {
  readonly mismatch: BindingMismatch;

  constructor(mismatch: BindingMismatch, label?: string) {
    const prefix = label ? `Pipeline '${label}': ` : "";
    super(ERROR_CODES.BINDING_MISMATCH, prefix + describeMismatch(mismatch));
    this.name = "BindingMismatchError";
    this.mismatch = mismatch;
  }
}

export class BindingRejectedError extends GpuError {
  readonly slot: string;

  constructor(slot: string, reason: string) {
    super(ERROR_CODES.BINDING_REJECTED, `Binding rejected for '${slot}': ${reason}`);
    this.name = "BindingRejectedError";
    this.slot = slot;
  }
}

export class IncompleteBindingError extends GpuError {
  readonly slot: string;

  constructor(slot: string) {
    super(ERROR_CODES.INCOMPLETE_BINDING, `Cannot draw: required slot '${slot}' is unbound`);
    this.name = "IncompleteBindingError";
    this.slot = slot;
  }
}

export class CaptureOverflowError extends GpuError {
  readonly slot: string;
  readonly requiredBytes: number;
  readonly capacityBytes: number;

  constructor(slot: string, requiredBytes: number, capacityBytes: number) {
    super(
      ERROR_CODES.CAPTURE_OVERFLOW,
      `Capture into '${slot}' needs ${requiredBytes} bytes but the buffer holds ${capacityBytes}`
    );
    this.name = "CaptureOverflowError";
    this.slot = slot;
    this.requiredBytes = requiredBytes;
    this.capacityBytes = capacityBytes;
  }
}

export class ResourceBusyError extends GpuError {
  readonly resource: string;

  constructor(resource: string, reason: string) {
    super(ERROR_CODES.RESOURCE_BUSY, `Resource '${resource}' is busy: ${reason}`);
    this.name = "ResourceBusyError";
    this.resource = resource;
  }
}

export class TargetMismatchError extends GpuError {
  readonly expected: string;
  readonly actual: string;

  constructor(expected: string, actual: string) {
    super(ERROR_CODES.TARGET_MISMATCH, `Render target mismatch: pipeline expects ${expected}, got ${actual}`);
    this.name = "TargetMismatchError";
    this.expected = expected;
    this.actual = actual;
  }
}

export class PassStateError extends GpuError {
  readonly state: string;

  constructor(label: string, state: string, operation: string) {
    super(ERROR_CODES.PASS_STATE, `Cannot ${operation} render pass '${label}': pass is ${state}`);
    this.name = "PassStateError";
    this.state = state;
  }
}

export class IncompatibleBlitError extends GpuError {
  readonly source: string;
  readonly destination: string;

  constructor(source: string, destination: string, reason: string) {
    super(ERROR_CODES.INCOMPATIBLE_BLIT, `Cannot blit '${source}' into '${destination}': ${reason}`);
    this.name = "IncompatibleBlitError";
    this.source = source;
    this.destination = destination;
  }
}

export class DeviceLostError extends GpuError {
  constructor(reason: string) {
    super(ERROR_CODES.DEVICE_LOST, `Device lost: ${reason}`);
    this.name = "DeviceLostError";
  }
}
