import type { CanonicalField } from "@/types/domain";

export class MissingRequiredColumnError extends Error {
  readonly field: CanonicalField;
  readonly detectedHeaders: string[];

  constructor(field: CanonicalField, detectedHeaders: string[]) {
    const detected = detectedHeaders.slice(0, 20).join(", ") || "(none)";
    super(`Could not detect a required '${field}' column. Please check your headers. | Detected headers: ${detected}`);
    this.name = "MissingRequiredColumnError";
    this.field = field;
    this.detectedHeaders = detectedHeaders;
  }
}

export class RequestValidationError extends Error {
  readonly status: number;

  constructor(message: string, status = 400) {
    super(message);
    this.name = "RequestValidationError";
    this.status = status;
  }
}
