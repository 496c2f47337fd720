/**
 * Error codes for area generation.
 * Each code maps to exactly one error class below.
 */
export type GenerationErrorCode =
  | "INVALID_PARAMETER"
  | "GENERATION_TIMEOUT"
  | "DISCONNECTED_MAP";

/**
 * Base error for all generation failures.
 *
 * @example
 * ```typescript
 * const error = new InvalidParameterError(
 *   "Density must be within [0, 1]",
 *   { field: "monsterDensity", value: 1.4 },
 * );
 * error.code; // "INVALID_PARAMETER"
 * ```
 */
export class GenerationError extends Error {
  override readonly name: string = "GenerationError";

  constructor(
    public readonly code: GenerationErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);

    // Maintains proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  static isGenerationError(error: unknown): error is GenerationError {
    return error instanceof GenerationError;
  }

  toJSON(): {
    name: string;
    code: GenerationErrorCode;
    message: string;
    details?: Record<string, unknown>;
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}

/**
 * Bad seed or template input. Raised before any randomness is consumed.
 */
export class InvalidParameterError extends GenerationError {
  override readonly name: string = "InvalidParameterError";

  constructor(message: string, details?: Record<string, unknown>) {
    super("INVALID_PARAMETER", message, details);
  }
}

/**
 * BSP partitioning reached its depth bound without producing
 * the minimum room count.
 */
export class GenerationTimeoutError extends GenerationError {
  override readonly name: string = "GenerationTimeoutError";

  constructor(message: string, details?: Record<string, unknown>) {
    super("GENERATION_TIMEOUT", message, details);
  }
}

/**
 * Cellular automata never produced a large enough connected cave.
 */
export class DisconnectedMapError extends GenerationError {
  override readonly name: string = "DisconnectedMapError";

  constructor(message: string, details?: Record<string, unknown>) {
    super("DISCONNECTED_MAP", message, details);
  }
}

/**
 * Soft signal attached to a successful result when the simple random
 * generator ran out of attempts before reaching its room target.
 * Never thrown.
 */
export interface PartialGenerationWarning {
  readonly kind: "partial-generation";
  readonly message: string;
  readonly requestedRooms: number;
  readonly placedRooms: number;
  readonly attempts: number;
}

export type GenerationWarning = PartialGenerationWarning;
