export type SlabInputErrorCode = "count_mismatch" | "invalid_id" | "invalid_number" | "no_rows";

/** Pasted or typed measurements could not be turned into records. The working set stays as it was. */
export class SlabInputError extends Error {
  readonly code: SlabInputErrorCode;

  constructor(code: SlabInputErrorCode, message: string) {
    super(message);
    this.name = "SlabInputError";
    this.code = code;
  }
}

export const EMPTY_REPORT_MESSAGE = "Please enter dimensions for at least one slab.";

/** Generation was asked for with no slab left after filtering. */
export class EmptyReportError extends Error {
  readonly code = "no_data" as const;

  constructor(message: string = EMPTY_REPORT_MESSAGE) {
    super(message);
    this.name = "EmptyReportError";
  }
}
