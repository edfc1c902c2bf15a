import type { DataQualityIssue } from "@aerosol-dw/types";

export type TransformErrorReason = "RECORD_PARSE" | "COORDINATE_INVALID" | "SCHEMA_MISMATCH";

export class TransformError extends Error {
  readonly reason: TransformErrorReason;

  constructor(reason: TransformErrorReason, message: string) {
    super(message);
    this.reason = reason;
    this.name = "TransformError";
    Object.setPrototypeOf(this, TransformError.prototype);
  }
}

export class RecordParseError extends TransformError {
  readonly rowIndex: number;

  constructor(rowIndex: number, message: string) {
    super("RECORD_PARSE", message);
    this.rowIndex = rowIndex;
    this.name = "RecordParseError";
    Object.setPrototypeOf(this, RecordParseError.prototype);
  }

  toIssue(): DataQualityIssue {
    return { reason: "RECORD_PARSE", message: this.message, rowIndex: this.rowIndex };
  }
}

export class CoordinateValidationError extends TransformError {
  readonly siteKey: string;

  constructor(siteKey: string, message: string) {
    super("COORDINATE_INVALID", message);
    this.siteKey = siteKey;
    this.name = "CoordinateValidationError";
    Object.setPrototypeOf(this, CoordinateValidationError.prototype);
  }

  toIssue(): DataQualityIssue {
    return { reason: "COORDINATE_INVALID", message: this.message, siteKey: this.siteKey };
  }
}

/** Fatal: the input table lacks columns the transform cannot do without. */
export class SchemaMismatchError extends TransformError {
  readonly missingColumns: string[];

  constructor(missingColumns: string[], message?: string) {
    super("SCHEMA_MISMATCH", message ?? `Input table is missing required columns: ${missingColumns.join(", ")}`);
    this.missingColumns = missingColumns;
    this.name = "SchemaMismatchError";
    Object.setPrototypeOf(this, SchemaMismatchError.prototype);
  }
}
