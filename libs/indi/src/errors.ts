/**
 * Error codes raised by the INDI core
 */
export type IndiErrorCode =
  | "DEFINITION_PARSE"
  | "NOT_FOUND"
  | "ALREADY_RUNNING"
  | "NOT_RUNNING"
  | "CHANNEL_UNAVAILABLE"
  | "START_FAILED"
  | "INVALID_DIRECTIVE"
  | "PROFILE_NOT_FOUND";

/**
 * Base class carrying a machine-readable code and optional details
 */
export class IndiError extends Error {
  public readonly code: IndiErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(code: IndiErrorCode, message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super(message, options);
    this.name = "IndiError";
    this.code = code;
    this.details = details;
  }

  toJSON(): { code: IndiErrorCode; message: string; details?: Record<string, unknown> } {
    return {
      code: this.code,
      message: this.message,
      ...(this.details ? { details: this.details } : {})
    };
  }
}

export class DefinitionParseError extends IndiError {
  constructor(file: string, reason: string, options?: ErrorOptions) {
    super("DEFINITION_PARSE", `Invalid driver definition file ${file}: ${reason}`, { file, reason }, options);
    this.name = "DefinitionParseError";
  }
}

export class DriverNotFoundError extends IndiError {
  constructor(label: string) {
    super("NOT_FOUND", `Driver not found: ${label}`, { label });
    this.name = "DriverNotFoundError";
  }
}

export class AlreadyRunningError extends IndiError {
  constructor(state: string) {
    super("ALREADY_RUNNING", `INDI server is already ${state}. Stop it before starting again.`, { state });
    this.name = "AlreadyRunningError";
  }
}

export class NotRunningError extends IndiError {
  constructor(operation: string) {
    super("NOT_RUNNING", `Cannot ${operation}: INDI server is not running`, { operation });
    this.name = "NotRunningError";
  }
}

export class ChannelUnavailableError extends IndiError {
  constructor(path: string, reason: string, options?: ErrorOptions) {
    super("CHANNEL_UNAVAILABLE", `Control pipe ${path} is unavailable: ${reason}`, { path, reason }, options);
    this.name = "ChannelUnavailableError";
  }
}

export class StartFailedError extends IndiError {
  constructor(reason: string, options?: ErrorOptions) {
    super("START_FAILED", `INDI server failed to start: ${reason}`, { reason }, options);
    this.name = "StartFailedError";
  }
}

export class ControlDirectiveError extends IndiError {
  constructor(field: string, value: string) {
    super("INVALID_DIRECTIVE", `Driver ${field} cannot be sent over the control pipe: ${JSON.stringify(value)}`, {
      field,
      value
    });
    this.name = "ControlDirectiveError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
