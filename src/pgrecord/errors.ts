// errors.ts

export class PgRecordError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A field annotation could not be turned into a column; registration stops. */
export class AnnotationError extends PgRecordError {
  constructor(
    readonly table: string,
    readonly field: string,
    message: string,
    options?: ErrorOptions
  ) {
    super(`${table}.${field}: ${message}`, options);
  }
}

export class QueryBuildError extends PgRecordError {
  constructor(readonly table: string, message: string) {
    super(`${table}: ${message}`);
  }
}

/** Declared schema and live catalog disagree. */
export class ReconciliationError extends PgRecordError {
  constructor(
    message: string,
    readonly table: string,
    readonly column?: string | undefined,
    readonly live?: string | undefined,
    readonly code?: string | undefined
  ) {
    super(message);
  }
}

export class ScanError extends PgRecordError {
  constructor(
    readonly table: string,
    readonly field: string,
    message: string
  ) {
    super(`${table}: ${message}`);
  }
}

export class RegistryError extends PgRecordError {}
