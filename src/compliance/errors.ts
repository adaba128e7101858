// src/compliance/errors.ts
// Scanner error taxonomy.
//
// Every error that aborts a scan extends ScanError, which carries a stable
// machine-readable code and the HTTP status the API layer should answer with.
// Delegate and recognizer failures are recovered inside the classifier and
// never surface as ScanErrors.

export type ScanErrorCode =
  | "unsupported_format"
  | "corrupt_document"
  | "encoding_error"
  | "scan_aborted"
  | "invalid_lexicon";

export interface SerializedScanError {
  error: ScanErrorCode;
  message: string;
}

export class ScanError extends Error {
  constructor(
    public readonly code: ScanErrorCode,
    message: string,
    public readonly statusCode: number = 500
  ) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): SerializedScanError {
    return { error: this.code, message: this.message };
  }
}

/** Declared format is not one of plain_text, word_document, pdf, slide_deck */
export class UnsupportedFormatError extends ScanError {
  constructor(public readonly format: string) {
    super("unsupported_format", `Unsupported document format: ${format || "(none)"}`, 415);
  }
}

/** The format's parser could not open the byte stream */
export class CorruptDocumentError extends ScanError {
  constructor(format: string, detail?: string) {
    super(
      "corrupt_document",
      `Could not read ${format} document${detail ? `: ${detail}` : ""}`,
      422
    );
  }
}

/** Plain text that is not valid UTF-8 */
export class EncodingError extends ScanError {
  constructor(detail?: string) {
    super("encoding_error", `Document is not valid UTF-8${detail ? `: ${detail}` : ""}`, 422);
  }
}

/** Caller cancelled the scan between blocks */
export class ScanAbortedError extends ScanError {
  constructor() {
    super("scan_aborted", "Scan was cancelled", 499);
  }
}

/** Term configuration failed validation at load time */
export class InvalidLexiconError extends ScanError {
  constructor(detail: string) {
    super("invalid_lexicon", `Invalid lexicon: ${detail}`, 500);
  }
}

/** Delegate answered with something that is neither institutional nor descriptive */
export class DelegateResponseError extends Error {
  constructor(public readonly response: string) {
    super("Classifier delegate response could not be parsed");
    this.name = "DelegateResponseError";
  }
}
