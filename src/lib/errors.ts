export type ErrorCode = "EMPTY_DATASET" | "INVALID_FILTER" | "CONFIG" | "INGEST";

export class FeedbackInsightsError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class EmptyDatasetError extends FeedbackInsightsError {
  constructor() {
    super("EMPTY_DATASET", "No data: the loaded dataset has no rows");
  }
}

export class InvalidFilterError extends FeedbackInsightsError {
  constructor(message: string) {
    super("INVALID_FILTER", message);
  }
}

export class ConfigError extends FeedbackInsightsError {
  constructor(message: string) {
    super("CONFIG", message);
  }
}

export class IngestError extends FeedbackInsightsError {
  constructor(message: string) {
    super("INGEST", message);
  }
}
