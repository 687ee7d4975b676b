/**
 * Fatal conditions of a conversion run. Anything thrown from here aborts the
 * run; per-row problems are logged and skipped instead.
 */
export class ConversionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConversionError";
  }
}

export class UsageError extends ConversionError {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export class ConfigurationError extends ConversionError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class InputNotFoundError extends ConversionError {
  constructor(public readonly path: string) {
    super(`Input file not found: ${path}`);
    this.name = "InputNotFoundError";
  }
}

export class ParseError extends ConversionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ParseError";
  }
}

export class EmptyInputError extends ConversionError {
  constructor(message = "No data found in input file") {
    super(message);
    this.name = "EmptyInputError";
  }
}

export class ColumnNotFoundError extends ConversionError {
  constructor(
    public readonly column: string,
    public readonly availableColumns: readonly string[],
    role = "Column"
  ) {
    super(
      `${role} '${column}' not found in input. Available columns: ${availableColumns.join(", ")}`
    );
    this.name = "ColumnNotFoundError";
  }
}

export class ResolverUnavailableError extends ConversionError {
  constructor(reason: string) {
    super(`Geocoding is not available: ${reason}`);
    this.name = "ResolverUnavailableError";
  }
}
