/**
 * Structured error types for CSV to JSON conversion
 */

/** Error type categories */
export type CSVErrorType = "Quotes" | "Header" | "Input";

/** Error codes */
export type CSVErrorCode =
  | "QuoteInTheMiddle"
  | "QuoteUnbalanced"
  | "AppendFailed"
  | "LineTooLong";

const ERROR_TYPES: Record<CSVErrorCode, CSVErrorType> = {
  QuoteInTheMiddle: "Quotes",
  QuoteUnbalanced: "Quotes",
  AppendFailed: "Header",
  LineTooLong: "Input",
};

/** Location details attached to an error */
export interface CSVErrorLocation {
  /** 1-based input line number */
  line?: number;
  /** Character index within the line (if applicable) */
  index?: number;
}

/** Structured CSV conversion error */
export class CSVError extends Error {
  /** Error category */
  readonly type: CSVErrorType;
  /** Specific error code */
  readonly code: CSVErrorCode;
  readonly line?: number;
  readonly index?: number;

  constructor(code: CSVErrorCode, message: string, location: CSVErrorLocation = {}) {
    super(message);
    this.name = "CSVError";
    this.code = code;
    this.type = ERROR_TYPES[code];
    this.line = location.line;
    this.index = location.index;
  }

  /**
   * Copy of this error tagged with an input line number.
   */
  withLine(line: number): CSVError {
    return new CSVError(this.code, this.message, { line, index: this.index });
  }
}

/** Error callback function type */
export type CSVErrorCallback = (error: CSVError) => void;

export function isCSVError(err: unknown): err is CSVError {
  return err instanceof CSVError;
}
