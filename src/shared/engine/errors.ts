/**
 * Engine Domain Errors - Structured error types for the Klotski engine
 *
 * The search itself (Board, GraphNode, DecisionGraphBuilder) is a pure
 * computation over already-validated boards and does not throw for bad
 * input. These types are raised at the boundaries:
 *
 * - **BoardConfigError**: the incoming board configuration is malformed
 *   (wrong shape) or describes an impossible puzzle (overlaps, blocks out
 *   of bounds, unknown winning block).
 * - **InvalidBoardState**: an internal inconsistency detected while
 *   enumerating states; indicates a bug rather than bad input.
 *
 * Usage:
 * ```typescript
 * import { BoardConfigError, EngineErrorCode } from './errors';
 *
 * throw new BoardConfigError(
 *   EngineErrorCode.CONFIG_VALIDATION_FAILED,
 *   'Board configuration is invalid',
 *   { errors: ['Blocks 1 and 2 overlap!'] }
 * );
 * ```
 *
 * @module EngineErrors
 */

// =============================================================================
// ERROR CODES
// =============================================================================

/**
 * Enumeration of all engine error codes.
 *
 * Error codes are prefixed by category:
 * - CONFIG_*: Board configuration problems
 * - STATE_*: Board state inconsistency
 * - INTERNAL_*: Engine bugs
 */
export enum EngineErrorCode {
  /** Configuration record failed schema validation */
  CONFIG_INVALID_SHAPE = 'CONFIG_INVALID_SHAPE',
  /** Configuration is well-formed but describes an impossible board */
  CONFIG_VALIDATION_FAILED = 'CONFIG_VALIDATION_FAILED',
  /** Configuration file could not be read or parsed */
  CONFIG_UNREADABLE = 'CONFIG_UNREADABLE',

  /** Expected block missing from a board */
  STATE_BLOCK_NOT_FOUND = 'STATE_BLOCK_NOT_FOUND',

  /** Assertion failed - indicates a bug */
  INTERNAL_ASSERTION_FAILED = 'INTERNAL_ASSERTION_FAILED',
}

/**
 * Maps error code prefixes to human-readable category descriptions.
 */
export const ERROR_CATEGORY_DESCRIPTIONS: Record<string, string> = {
  CONFIG_: 'Invalid board configuration',
  STATE_: 'Corrupted or unexpected board state',
  INTERNAL_: 'Internal engine error (bug)',
};

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/**
 * Base class for all engine errors.
 */
export class KlotskiError extends Error {
  /** Error code for programmatic handling */
  readonly code: EngineErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Domain that generated the error (e.g., 'BoardConfig', 'Board') */
  readonly domain: string;

  readonly timestamp: Date;

  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Engine'
  ) {
    super(message);
    this.name = 'KlotskiError';
    this.code = code;
    this.context = context;
    this.domain = domain;
    this.timestamp = new Date();

    Object.setPrototypeOf(this, KlotskiError.prototype);
  }

  /** Get error category from code prefix */
  get category(): string {
    const prefix = this.code.split('_')[0] + '_';
    return ERROR_CATEGORY_DESCRIPTIONS[prefix] ?? 'Unknown error category';
  }

  /** Serialize to a JSON-safe object for logging */
  toJSON(): KlotskiErrorJSON {
    return {
      error: true,
      type: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      context: this.context,
      category: this.category,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/**
 * JSON representation of a KlotskiError.
 */
export interface KlotskiErrorJSON {
  error: true;
  type: string;
  code: string;
  message: string;
  domain: string;
  context: Record<string, unknown>;
  category: string;
  timestamp: string;
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

/**
 * Error for malformed or physically impossible board configurations.
 *
 * The context of a CONFIG_VALIDATION_FAILED error carries the full list of
 * validation messages under `errors`.
 */
export class BoardConfigError extends KlotskiError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'BoardConfig'
  ) {
    super(code, message, context, domain);
    this.name = 'BoardConfigError';
    Object.setPrototypeOf(this, BoardConfigError.prototype);
  }

  /** Validation messages attached to this error, if any. */
  get errors(): string[] {
    const errors = this.context.errors;
    return Array.isArray(errors) ? errors.filter((e): e is string => typeof e === 'string') : [];
  }
}

/**
 * Error for an inconsistent board discovered during state enumeration.
 */
export class InvalidBoardState extends KlotskiError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Board'
  ) {
    super(code, message, context, domain);
    this.name = 'InvalidBoardState';
    Object.setPrototypeOf(this, InvalidBoardState.prototype);
  }
}

// =============================================================================
// TYPE GUARDS
// =============================================================================

export function isKlotskiError(error: unknown): error is KlotskiError {
  return error instanceof KlotskiError;
}

export function isBoardConfigError(error: unknown): error is BoardConfigError {
  return error instanceof BoardConfigError;
}

export function isInvalidBoardState(error: unknown): error is InvalidBoardState {
  return error instanceof InvalidBoardState;
}

// =============================================================================
// UTILITIES
// =============================================================================

/**
 * Wrap an unknown error in a KlotskiError.
 *
 * Useful for catching and normalizing errors at domain boundaries.
 */
export function wrapKlotskiError(
  error: unknown,
  domain: string = 'Engine',
  context: Record<string, unknown> = {}
): KlotskiError {
  if (isKlotskiError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return new KlotskiError(
    EngineErrorCode.INTERNAL_ASSERTION_FAILED,
    message,
    {
      ...context,
      originalStack: stack,
    },
    domain
  );
}
