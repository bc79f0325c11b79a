import { sanitizeErrorContext } from './errorContext.js';

/** Schema version carried by every JSON error report. */
export const MPQ_REPORT_SCHEMA_VERSION = '1';

/** Stable MPQ error codes. */
export type MpqErrorCode =
  | 'MPQ_BAD_SIGNATURE'
  | 'MPQ_UNSUPPORTED_FORMAT'
  | 'MPQ_BAD_HEADER'
  | 'MPQ_TRUNCATED_HEADER'
  | 'MPQ_TRUNCATED_TABLE'
  | 'MPQ_BAD_HASH_TABLE'
  | 'MPQ_BAD_BLOCK_TABLE'
  | 'MPQ_HASH_TABLE_FULL'
  | 'MPQ_DUPLICATE_ENTRY'
  | 'MPQ_NOT_FOUND'
  | 'MPQ_BLOCK_OUT_OF_RANGE'
  | 'MPQ_BLOCK_DELETED'
  | 'MPQ_CORRUPT_SECTOR'
  | 'MPQ_UNSUPPORTED_COMPRESSION'
  | 'MPQ_UNSUPPORTED_FEATURE'
  | 'MPQ_LIMIT_EXCEEDED'
  | 'MPQ_WRITER_CLOSED';

/** Error thrown for MPQ parsing, lookup, extraction and write failures. */
export class MpqError extends Error {
  /** Machine-readable error code. */
  readonly code: MpqErrorCode;
  /** Archive file name related to the error, if available. */
  readonly entryName?: string | undefined;
  /** Byte offset from the archive start, if available. */
  readonly offset?: bigint | undefined;
  /** Underlying cause, if available. */
  override readonly cause?: unknown;
  /** Additional context for serialization. */
  readonly context?: Record<string, string> | undefined;

  /** Create an MpqError with a stable code. */
  constructor(
    code: MpqErrorCode,
    message: string,
    options?: {
      entryName?: string | undefined;
      offset?: bigint | undefined;
      context?: Record<string, string> | undefined;
      cause?: unknown;
    }
  ) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'MpqError';
    this.code = code;
    this.entryName = options?.entryName;
    this.offset = options?.offset;
    this.context = options?.context;
    this.cause = options?.cause;
  }

  /** JSON-safe serialization with schemaVersion "1". */
  toJSON(): {
    schemaVersion: string;
    name: string;
    code: MpqErrorCode;
    message: string;
    hint: string;
    context: Record<string, string>;
    entryName?: string;
    offset?: string;
  } {
    const topLevelShadowKeys: string[] = [];
    if (this.entryName !== undefined) topLevelShadowKeys.push('entryName');
    if (this.offset !== undefined) topLevelShadowKeys.push('offset');
    const context = sanitizeErrorContext(this.context, topLevelShadowKeys);
    return {
      schemaVersion: MPQ_REPORT_SCHEMA_VERSION,
      name: this.name,
      code: this.code,
      message: this.message,
      hint: this.message,
      context,
      ...(this.entryName !== undefined ? { entryName: this.entryName } : {}),
      ...(this.offset !== undefined ? { offset: this.offset.toString() } : {})
    };
  }
}

/** Non-fatal MPQ warning codes. */
export type MpqWarningCode =
  | 'MPQ_ARCHIVE_SIZE_MISMATCH'
  | 'MPQ_DANGLING_HASH_ENTRY'
  | 'MPQ_LISTFILE_UNREADABLE'
  | 'MPQ_HEADER_SIZE_MISMATCH';

/** Non-fatal warning produced while opening an archive. */
export type MpqWarning = {
  code: MpqWarningCode;
  message: string;
  entryName?: string;
};
