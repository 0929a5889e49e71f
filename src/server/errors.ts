export type DatasetLoadErrorKind = "not_found" | "empty" | "missing_column";

export abstract class DatasetLoadError extends Error {
  abstract readonly kind: DatasetLoadErrorKind;
}

export class DataFileNotFoundError extends DatasetLoadError {
  readonly kind = "not_found";

  constructor(
    readonly fileName: string,
    readonly candidates: string[],
  ) {
    super(`Data file not found. Please make sure '${fileName}' exists.`);
    this.name = "DataFileNotFoundError";
  }
}

export class EmptyDatasetError extends DatasetLoadError {
  readonly kind = "empty";

  constructor(readonly path: string) {
    super("The data file is empty.");
    this.name = "EmptyDatasetError";
  }
}

export class MissingColumnError extends DatasetLoadError {
  readonly kind = "missing_column";

  constructor(readonly column: string) {
    super(`Required column '${column}' not found in data.`);
    this.name = "MissingColumnError";
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(issues.length ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigError";
  }
}
