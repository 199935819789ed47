/**
 * Structured error hierarchy for edge-fleet.
 *
 * All errors extend EdgeFleetError, which adds:
 *   - `code`: Machine-readable error code (e.g., "COMMAND_DEVICE_BUSY")
 *   - `context`: Arbitrary metadata for debugging (logged, not shown to user)
 *   - JSON serialization via toJSON()
 *
 * The code prefix decides how the HTTP layer reports the error:
 *   CONFIG_*      ConfigError           local config file problems
 *   NETWORK_*     NetworkError          transport failures, reply timeouts
 *   VALIDATION_*  ValidationError       bad input from an API caller
 *   STORAGE_*     StorageError          device store failures
 *   PROTOCOL_*    ProtocolError         malformed or out-of-order device frames
 *   COMMAND_*     CommandRejectedError  command preconditions not met
 *   NOT_FOUND_*   NotFoundError         unknown device
 */

export class EdgeFleetError extends Error {
  /** Machine-readable error code */
  readonly code: string;
  /** Structured debugging context, never exposed to end users */
  readonly context: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = "EdgeFleetError";
    this.code = code;
    this.context = context;
  }

  /** Serialize to a plain object for JSON logging and API responses */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/**
 * @example
 *   throw new ConfigError("Config file not found", "CONFIG_NOT_FOUND", { path })
 */
export class ConfigError extends EdgeFleetError {
  constructor(
    message: string,
    code: string = "CONFIG_ERROR",
    context: Record<string, unknown> = {},
  ) {
    super(message, code, context);
    this.name = "ConfigError";
  }
}

export class NetworkError extends EdgeFleetError {
  constructor(
    message: string,
    code: string = "NETWORK_ERROR",
    context: Record<string, unknown> = {},
  ) {
    super(message, code, context);
    this.name = "NetworkError";
  }
}

export class ValidationError extends EdgeFleetError {
  constructor(
    message: string,
    code: string = "VALIDATION_ERROR",
    context: Record<string, unknown> = {},
  ) {
    super(message, code, context);
    this.name = "ValidationError";
  }
}

export class StorageError extends EdgeFleetError {
  constructor(
    message: string,
    code: string = "STORAGE_ERROR",
    context: Record<string, unknown> = {},
  ) {
    super(message, code, context);
    this.name = "StorageError";
  }
}

/**
 * A device frame that could not be parsed or applied. Dropped and logged;
 * the connection survives unless they repeat.
 */
export class ProtocolError extends EdgeFleetError {
  constructor(
    message: string,
    code: string = "PROTOCOL_ERROR",
    context: Record<string, unknown> = {},
  ) {
    super(message, code, context);
    this.name = "ProtocolError";
  }
}

/**
 * A command whose preconditions failed. Thrown synchronously to the issuer,
 * never retried by the dispatcher.
 *
 * @example
 *   throw new CommandRejectedError("Device is recording", "COMMAND_DEVICE_BUSY", { device_id })
 */
export class CommandRejectedError extends EdgeFleetError {
  constructor(
    message: string,
    code: string = "COMMAND_REJECTED",
    context: Record<string, unknown> = {},
  ) {
    super(message, code, context);
    this.name = "CommandRejectedError";
  }
}

export class NotFoundError extends EdgeFleetError {
  constructor(
    message: string,
    code: string = "NOT_FOUND",
    context: Record<string, unknown> = {},
  ) {
    super(message, code, context);
    this.name = "NotFoundError";
  }
}

/** Extract a printable message from anything thrown */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
