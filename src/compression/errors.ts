import { sanitizeErrorContext } from '../errorContext.js';
import { MPQ_REPORT_SCHEMA_VERSION } from '../errors.js';

/** Stable error codes for sector codecs. */
export type CompressionErrorCode =
  | 'COMPRESSION_UNSUPPORTED_ALGORITHM'
  | 'COMPRESSION_BAD_DATA'
  | 'COMPRESSION_RESOURCE_LIMIT'
  | 'COMPRESSION_ZLIB_BAD_DATA'
  | 'COMPRESSION_BZIP2_BAD_DATA'
  | 'COMPRESSION_BZIP2_CRC_MISMATCH'
  | 'COMPRESSION_PKWARE_BAD_DATA'
  | 'COMPRESSION_SPARSE_BAD_DATA';

/** Error thrown when a codec rejects its input or is not available. */
export class CompressionError extends Error {
  /** Machine-readable error code. */
  readonly code: CompressionErrorCode;
  /** Codec involved in the failure, if available. */
  readonly algorithm?: string;
  /** Underlying cause, if available. */
  override readonly cause?: unknown;
  /** Additional context for serialization. */
  readonly context?: Record<string, string> | undefined;

  /** Create a CompressionError with a stable code. */
  constructor(
    code: CompressionErrorCode,
    message: string,
    options?: { algorithm?: string; context?: Record<string, string> | undefined; cause?: unknown }
  ) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'CompressionError';
    this.code = code;
    if (options?.algorithm !== undefined) this.algorithm = options.algorithm;
    if (options?.context !== undefined) this.context = options.context;
    if (options?.cause !== undefined) this.cause = options.cause;
  }

  /** JSON-safe serialization with schemaVersion "1". */
  toJSON(): {
    schemaVersion: string;
    name: string;
    code: CompressionErrorCode;
    message: string;
    hint: string;
    context: Record<string, string>;
    algorithm?: string;
  } {
    const topLevelShadowKeys = this.algorithm !== undefined ? ['algorithm'] : [];
    const context = sanitizeErrorContext(this.context, topLevelShadowKeys);
    return {
      schemaVersion: MPQ_REPORT_SCHEMA_VERSION,
      name: this.name,
      code: this.code,
      message: this.message,
      hint: this.message,
      context,
      ...(this.algorithm !== undefined ? { algorithm: this.algorithm } : {})
    };
  }
}
