export type ErrorCode =
  | "MESSAGE_MALFORMED"
  | "COUNT_MISMATCH"
  | "VALUE_OUT_OF_RANGE"
  | "INVALID_TERM"
  | "INVALID_DOCUMENT_LENGTHS"
  | "INVALID_COLLECTION"
  | "INVALID_ARGUMENT"
  | "INVALID_STATE"
  | "IO_ERROR";

export interface FieldError {
  path: string;
  message: string;
}

export interface ConversionErrorParams {
  code: ErrorCode;
  detail?: string;
  /** offending term, when the failure is tied to one */
  term?: string;
  /** record index (term id) or 1-based line number, depending on the source */
  position?: number;
  errors?: FieldError[];
  cause?: unknown;
}

/**
 * Fatal conversion failure.
 *
 * Nothing is recovered locally: every instance aborts the run before any artifact is
 * finalized.
 */
export class ConversionError extends Error {
  readonly code: ErrorCode;
  readonly title: string;
  readonly detail?: string;
  readonly term?: string;
  readonly position?: number;
  readonly errors?: FieldError[];

  constructor(params: ConversionErrorParams) {
    const title = codeToTitle(params.code);
    super(params.detail ? `${title}: ${params.detail}` : title, { cause: params.cause });
    this.name = "ConversionError";
    this.code = params.code;
    this.title = title;
    this.detail = params.detail;
    this.term = params.term;
    this.position = params.position;
    this.errors = params.errors;
  }
}

export function isConversionError(e: unknown): e is ConversionError {
  return e instanceof ConversionError;
}

export function malformed(detail: string, position?: number): ConversionError {
  return new ConversionError({ code: "MESSAGE_MALFORMED", detail, position });
}

function codeToTitle(code: ErrorCode): string {
  switch (code) {
    case "MESSAGE_MALFORMED":
      return "Malformed message";
    case "COUNT_MISMATCH":
      return "Posting count mismatch";
    case "VALUE_OUT_OF_RANGE":
      return "Value out of range";
    case "INVALID_TERM":
      return "Invalid term";
    case "INVALID_DOCUMENT_LENGTHS":
      return "Invalid document lengths";
    case "INVALID_COLLECTION":
      return "Invalid binary collection";
    case "INVALID_ARGUMENT":
      return "Invalid argument";
    case "INVALID_STATE":
      return "Invalid state";
    case "IO_ERROR":
      return "I/O error";
  }
}
