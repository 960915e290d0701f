/**
 * Error classes raised while decoding and extracting VFS archives.
 */

export type VfsFormatErrorCode =
  | 'TOO_SMALL'
  | 'BAD_MAGIC'
  | 'UNSUPPORTED_VERSION'
  | 'ZERO_LENGTH_NAME'
  | 'INVALID_NAME'
  | 'TRUNCATED'
  | 'OFFSET_OUT_OF_RANGE'
  | 'RANGE_EXCEEDS_ARCHIVE'
  | 'UNSAFE_PATH';

export type VfsIoErrorCode =
  | 'OPEN_FAILED'
  | 'READ_FAILED'
  | 'CREATE_DIR_FAILED'
  | 'CREATE_FILE_FAILED'
  | 'WRITE_FAILED'
  | 'CLOSE_FAILED'
  | 'UNEXPECTED_EOF';

/**
 * Where in the archive an error happened. Header errors carry no entry.
 */
export interface VfsErrorContext {
  /** 1-based entry index. */
  readonly entryIndex?: number;
  readonly entryName?: string;
  /** Byte offset in the archive. */
  readonly offset?: number;
}

function formatContext(context: VfsErrorContext): string {
  const parts: string[] = [];
  if (context.entryIndex !== undefined) {
    parts.push(`entry ${context.entryIndex}`);
  }
  if (context.entryName !== undefined) {
    parts.push(`('${context.entryName}')`);
  }
  if (context.offset !== undefined) {
    parts.push(`at offset ${context.offset}`);
  }
  return parts.length > 0 ? `${parts.join(' ')}: ` : '';
}

/**
 * Base class for every error this package raises.
 * The message is prefixed with the context, e.g. `entry 2 ('a/b.txt') at offset 40: ...`.
 */
export abstract class VfsError extends Error {
  readonly entryIndex?: number;
  readonly entryName?: string;
  readonly offset?: number;
  /** Message without the context prefix. */
  readonly detail: string;

  protected constructor(detail: string, context: VfsErrorContext, cause?: unknown) {
    super(`${formatContext(context)}${detail}`, cause !== undefined ? { cause } : undefined);
    this.detail = detail;
    this.entryIndex = context.entryIndex;
    this.entryName = context.entryName;
    this.offset = context.offset;
  }
}

/** The archive bytes deviate from the expected layout. */
export class VfsFormatError extends VfsError {
  constructor(
    public readonly code: VfsFormatErrorCode,
    detail: string,
    context: VfsErrorContext = {},
    cause?: unknown
  ) {
    super(detail, context, cause);
    this.name = 'VfsFormatError';
  }
}

/** Reading the archive or writing extracted files failed. */
export class VfsIoError extends VfsError {
  constructor(
    public readonly code: VfsIoErrorCode,
    detail: string,
    context: VfsErrorContext = {},
    cause?: unknown
  ) {
    super(detail, context, cause);
    this.name = 'VfsIoError';
  }
}

/** An invariant of the reader itself was violated. */
export class VfsInternalError extends VfsError {
  constructor(detail: string, context: VfsErrorContext = {}, cause?: unknown) {
    super(detail, context, cause);
    this.name = 'VfsInternalError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
