/** Schema version stamped on every serialized error. */
export const REPORT_SCHEMA_VERSION = '1';

const RESERVED_CONTEXT_KEYS: readonly string[] = ['schemaVersion', 'name', 'code', 'message', 'context'];

/**
 * Copy an error context, dropping keys that would shadow the top-level
 * fields of a serialized error.
 */
export function sanitizeErrorContext(
  context: Record<string, string> | undefined,
  topLevelShadowKeys: readonly string[] = []
): Record<string, string> {
  if (!context) return {};
  const reserved = new Set<string>([...RESERVED_CONTEXT_KEYS, ...topLevelShadowKeys]);
  const sanitized: Record<string, string> = {};
  for (const [key, value] of Object.entries(context)) {
    if (reserved.has(key)) continue;
    sanitized[key] = value;
  }
  return sanitized;
}

/** Fields present on every serialized error. */
export type ErrorReport<C extends string> = {
  schemaVersion: string;
  name: string;
  code: C;
  message: string;
  context: Record<string, string>;
};

export type CodedErrorOptions = {
  context?: Record<string, string> | undefined;
  cause?: unknown;
};

/**
 * Error with a stable machine-readable code and a JSON form. Subclasses add
 * typed details that serialize next to the common fields.
 */
export abstract class CodedError<C extends string, D extends object> extends Error {
  readonly code: C;
  /** Underlying cause, if available. */
  override readonly cause?: unknown;
  /** Additional context for serialization. */
  readonly context?: Record<string, string> | undefined;

  constructor(name: string, code: C, message: string, options?: CodedErrorOptions) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = name;
    this.code = code;
    this.context = options?.context;
    this.cause = options?.cause;
  }

  /** Details that are set; their keys are dropped from the serialized context. */
  protected abstract details(): D;

  /** JSON-safe serialization with schemaVersion "1". */
  toJSON(): ErrorReport<C> & D {
    const details = this.details();
    return {
      schemaVersion: REPORT_SCHEMA_VERSION,
      name: this.name,
      code: this.code,
      message: this.message,
      context: sanitizeErrorContext(this.context, Object.keys(details)),
      ...details
    };
  }
}
