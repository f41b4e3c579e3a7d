/**
 * Error kinds raised by parsers, loaders and the identity normalizer.
 * Row-level problems are not errors: they become SkippedRow values.
 */

/** A required column is missing from an input or reference file. */
export class SchemaError extends Error {
  constructor(
    public readonly column: string,
    public readonly source: string,
    public readonly file_name?: string
  ) {
    super(
      `Required column "${column}" missing from ${source} file` +
        (file_name ? ` ${file_name}` : '')
    );
    this.name = 'SchemaError';
  }
}

/** A fusion identity cannot be formed from the given genes or breakpoints. */
export class MalformedIdentityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedIdentityError';
  }
}

/** A source file produced no usable record. */
export class EmptyResultError extends Error {
  constructor(
    public readonly source: string,
    public readonly file_name: string,
    public readonly skipped_rows: number
  ) {
    super(
      `${source} file ${file_name} yielded no usable records` +
        (skipped_rows > 0 ? ` (${skipped_rows} rows skipped)` : '')
    );
    this.name = 'EmptyResultError';
  }
}
