/**
 * Error types raised by the data pipeline.
 *
 * Empty selections and empty search results are result states, not errors;
 * see `ResolvedSelection` and `PageResult`.
 */

export class SchemaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SchemaError';
  }
}

export class ChartConstructionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ChartConstructionError';
  }
}

export class CsvFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CsvFormatError';
  }
}
