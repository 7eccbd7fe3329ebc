/**
 * Error types raised by the engine. Terminal outcomes (victory, defeat,
 * timeout) are values on WorldState, never errors.
 */

export type SimErrorCode = "INVALID_CONFIG" | "INVARIANT_VIOLATION";

export class SimError extends Error {
  readonly code: SimErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: SimErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "SimError";
    this.code = code;
    this.details = details;
  }

  static isSimError(error: unknown): error is SimError {
    return error instanceof SimError;
  }
}

/** A run configuration the engine refuses to start with. */
export class ConfigError extends SimError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("INVALID_CONFIG", message, details);
    this.name = "ConfigError";
  }
}

/** World state that no legal sequence of ticks can produce: a logic bug. */
export class InvariantError extends SimError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("INVARIANT_VIOLATION", message, details);
    this.name = "InvariantError";
  }
}
