/**
 * Error types raised by the canonicalizer, simulator and text parsers.
 *
 * Every error is raised eagerly, before any computation starts. A `Stuck`
 * simulation is a verdict, not an error, and never appears here.
 */

/**
 * Error codes for all loopgrid errors.
 */
export enum LoopgridErrorCode {
  /** Non-positive length, empty plan, bad step bound or malformed text */
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  /** Structurally inconsistent board */
  INVALID_BOARD = 'INVALID_BOARD',
}

/**
 * Base class for loopgrid errors.
 */
export abstract class LoopgridError extends Error {
  abstract readonly code: LoopgridErrorCode;

  constructor(
    message: string,
    public readonly details?: Readonly<Record<string, unknown>>
  ) {
    super(message);
  }
}

export class InvalidArgumentError extends LoopgridError {
  readonly code = LoopgridErrorCode.INVALID_ARGUMENT;

  constructor(message: string, details?: Readonly<Record<string, unknown>>) {
    super(message, details);
    this.name = 'InvalidArgumentError';
  }
}

export class InvalidBoardError extends LoopgridError {
  readonly code = LoopgridErrorCode.INVALID_BOARD;

  constructor(message: string, details?: Readonly<Record<string, unknown>>) {
    super(message, details);
    this.name = 'InvalidBoardError';
  }
}

/**
 * Type guard for loopgrid errors.
 */
export function isLoopgridError(value: unknown): value is LoopgridError {
  return value instanceof LoopgridError;
}
