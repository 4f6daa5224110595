/**
 * Fatal error types. Anything thrown from here stops the run;
 * row-level problems are logged and skipped instead.
 */

/**
 * The mapping reference table could not be read or lacks its columns
 */
export class MappingTableError extends Error {
  constructor(
    message: string,
    public filePath: string
  ) {
    super(message);
    this.name = 'MappingTableError';
  }
}

/**
 * A classifier or search output is unusable in a way that cannot be
 * treated as "no evidence"
 */
export class EvidenceSourceError extends Error {
  constructor(
    message: string,
    public source: string,
    public filePath: string
  ) {
    super(message);
    this.name = 'EvidenceSourceError';
  }
}

/**
 * The consensus directory handed to the pattern extractor does not exist
 */
export class CurationInputError extends Error {
  constructor(
    message: string,
    public directory: string
  ) {
    super(message);
    this.name = 'CurationInputError';
  }
}

/**
 * Bad command line invocation
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Message of an unknown thrown value
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
