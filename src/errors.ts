/**
 * Error hierarchy. Each pipeline stage throws its own subclass so callers can
 * tell where a failure happened; the underlying error travels as `cause`.
 */

export class CorpusError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CorpusError';
  }
}

/** Document missing, unreadable, or path invalid. */
export class DataLoadError extends CorpusError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DataLoadError';
  }
}

/** Document present but structurally wrong, or an entity failed validation. */
export class DataValidationError extends CorpusError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DataValidationError';
  }
}

export class NormalizationError extends CorpusError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NormalizationError';
  }
}

export class TokenizationError extends CorpusError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TokenizationError';
  }
}

export class TransliterationError extends CorpusError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransliterationError';
  }
}

/** Invalid filter bounds, or a custom predicate that threw. */
export class FilterError extends CorpusError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FilterError';
  }
}

export class GraphBuildError extends CorpusError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GraphBuildError';
  }
}

export class ExportError extends CorpusError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ExportError';
  }
}

export class CorpusNotBuiltError extends CorpusError {
  constructor() {
    super('Corpus not built. Call build() first.');
    this.name = 'CorpusNotBuiltError';
  }
}

/**
 * Message of an unknown thrown value.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
