export type MatchingErrorCode =
  | "missing_input"
  | "empty_document"
  | "unsupported_format"
  | "extraction_failed"
  | "embedding_failed"
  | "invalid_match_response";

export class MatchingError extends Error {
  constructor(
    message: string,
    readonly code: MatchingErrorCode,
    readonly statusCode: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class MissingInputError extends MatchingError {
  constructor(message: string) {
    super(message, "missing_input", 400);
  }
}

export class EmptyDocumentError extends MatchingError {
  constructor(message = "Could not extract text from resume file") {
    super(message, "empty_document", 400);
  }
}

export class UnsupportedFormatError extends MatchingError {
  constructor(readonly extension: string) {
    super(`Unsupported document type: ${extension || "(none)"}. Please upload PDF, DOCX or TXT.`, "unsupported_format", 400);
  }
}

export class ExtractionError extends MatchingError {
  constructor(source: "resume" | "job_description", cause: unknown) {
    super(`Failed to parse ${source.replace("_", " ")} text.`, "extraction_failed", 500, { cause });
  }
}

export class EmbeddingFailure extends MatchingError {
  constructor(message: string, cause?: unknown) {
    super(message, "embedding_failed", 502, { cause });
  }
}

export class InvalidMatchResponseError extends MatchingError {
  constructor(readonly field: string) {
    super(`Invalid match response: field "${field}" is missing or has the wrong type.`, "invalid_match_response", 400);
  }
}
