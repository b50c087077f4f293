import { CodedError, type CodedErrorOptions } from '../codedError.js';

/** Stable resource error codes. */
export type ResourceErrorCode =
  | 'RESOURCE_NOT_FOUND'
  | 'RESOURCE_PATH_NOT_FOUND'
  | 'RESOURCE_UNKNOWN_FORMAT'
  | 'RESOURCE_UNKNOWN_ENCODING'
  | 'RESOURCE_DECODE_ERROR'
  | 'RESOURCE_UNSUPPORTED_OPERATION'
  | 'RESOURCE_UNSUPPORTED_PROTOCOL'
  | 'RESOURCE_PARSER_UNAVAILABLE'
  | 'RESOURCE_ALREADY_EXISTS'
  | 'RESOURCE_CLOSED';

export type ResourceErrorDetails = {
  resourceName?: string;
  searchedRoots?: string[];
  packageName?: string;
};

/** Error thrown by resolution, loading and text decoding. */
export class ResourceError extends CodedError<ResourceErrorCode, ResourceErrorDetails> {
  /** Normalized resource name or URL related to the error, if available. */
  readonly resourceName?: string | undefined;
  /** Roots searched before giving up, for `RESOURCE_NOT_FOUND`. */
  readonly searchedRoots?: readonly string[] | undefined;
  /** Package most likely to provide the resource, for `RESOURCE_NOT_FOUND`. */
  readonly packageName?: string | undefined;

  constructor(
    code: ResourceErrorCode,
    message: string,
    options?: CodedErrorOptions & {
      resourceName?: string | undefined;
      searchedRoots?: readonly string[] | undefined;
      packageName?: string | undefined;
    }
  ) {
    super('ResourceError', code, message, options);
    this.resourceName = options?.resourceName;
    this.searchedRoots = options?.searchedRoots ? [...options.searchedRoots] : undefined;
    this.packageName = options?.packageName;
  }

  protected details(): ResourceErrorDetails {
    return {
      ...(this.resourceName !== undefined ? { resourceName: this.resourceName } : {}),
      ...(this.searchedRoots !== undefined ? { searchedRoots: [...this.searchedRoots] } : {}),
      ...(this.packageName !== undefined ? { packageName: this.packageName } : {})
    };
  }
}

/**
 * Human-facing report for a failed lookup: which package to install, what was
 * looked up and where.
 */
export function formatResourceNotFound(error: ResourceError): string {
  const rule = '*'.repeat(70);
  const lines = [rule];
  if (error.packageName) {
    lines.push(`  Resource ${error.packageName} not found.`);
    lines.push('  Install the data package that provides it, or add its location to the search path.');
    lines.push('');
  }
  lines.push(`  Attempted to load ${error.resourceName ?? '(unknown)'}`);
  lines.push('');
  lines.push('  Searched in:');
  for (const root of error.searchedRoots ?? []) {
    lines.push(`    - ${JSON.stringify(root)}`);
  }
  lines.push(rule);
  return lines.join('\n');
}
