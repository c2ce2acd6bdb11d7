/**
 * Error flags for configuring which checks the parser enforces.
 * These flags can be combined using bitwise OR.
 */
export const Errors = {
  /** Throw on fields this package does not model */
  UNKNOWN_FIELD: 1 << 0,
  /** Throw on frame tag directions other than forward, reverse and pingpong */
  UNKNOWN_DIRECTION: 1 << 1,
  /** Throw on frame tags whose range is reversed or ends past the last frame */
  INVALID_RANGE: 1 << 2,
  /** Enable all checks */
  ALL: 0b111,
  /** Ignore unknown fields and frame tag ranges, reject unknown directions */
  DEFAULT: 1 << 1,
} as const;

export type ErrorFlags = number;

/**
 * Check whether a flag is enabled.
 */
export function hasFlag(flags: ErrorFlags, flag: number): boolean {
  return (flags & flag) === flag;
}

/**
 * One problem found while decoding a document.
 */
export interface MalformedInputIssue {
  /** Field path, e.g. `frames[0].frame.x` */
  readonly path: string;
  readonly message: string;
  readonly expected?: string;
  readonly received?: string;
}

/**
 * Base interface for all sprite sheet exceptions
 */
export interface SheetExceptionInterface extends Error {
  readonly kind: string;
  readonly path?: string;
}

/**
 * Exception thrown when the input is not a well-formed sprite sheet document
 */
export class MalformedInputException extends Error implements SheetExceptionInterface {
  readonly kind = 'MalformedInput' as const;

  constructor(
    message: string,
    public readonly path?: string,
    public readonly expected?: string,
    public readonly received?: string,
    public readonly issues: readonly MalformedInputIssue[] = [],
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'MalformedInputException';
  }

  static createInvalidJson(cause: unknown): MalformedInputException {
    const detail = cause instanceof Error ? cause.message : String(cause);
    return new MalformedInputException(`Invalid JSON: ${detail}`, undefined, undefined, undefined, [], { cause });
  }

  static createFromIssues(issues: readonly MalformedInputIssue[]): MalformedInputException {
    const first = issues[0];
    if (!first) {
      return new MalformedInputException('Malformed sprite sheet');
    }

    const more = issues.length > 1 ? ` (and ${issues.length - 1} more)` : '';
    const location = first.path === '' ? 'document' : first.path;
    return new MalformedInputException(
      `Malformed sprite sheet at ${location}: ${first.message}${more}`,
      first.path,
      first.expected,
      first.received,
      issues,
    );
  }
}

/**
 * Narrow an unknown error to a malformed input failure.
 */
export function isMalformedInput(error: unknown): error is MalformedInputException {
  return error instanceof MalformedInputException;
}
