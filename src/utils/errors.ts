export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number = 500,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): {
    error: {
      code: string;
      message: string;
      details?: unknown;
    };
  } {
    return {
      error: {
        code: this.code,
        message: this.message,
        ...(this.details !== undefined && { details: this.details }),
      },
    };
  }
}

/** Invalid construction input or environment. Never retried. */
export class ConfigError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, "CONFIG_ERROR", 500, details);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, "VALIDATION_ERROR", 400, details);
  }
}

export class LocatorError extends AppError {
  constructor(cik: string, found: number) {
    super(
      `Insufficient filings: CIK ${cik} has ${found} 13F-HR filing(s), need 2`,
      "INSUFFICIENT_FILINGS",
      404,
      { cik, found },
    );
  }
}

export class FetchNotFoundError extends AppError {
  constructor(cik: string, accessionNumber: string) {
    super(`No information table found for ${accessionNumber}`, "INFO_TABLE_NOT_FOUND", 404, {
      cik,
      accessionNumber,
    });
  }
}

export class ParseError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, "PARSE_ERROR", 422, details);
  }
}

export class SecRequestError extends AppError {
  constructor(url: string, status: number) {
    super(`SEC request failed with HTTP ${status}: ${url}`, "SEC_REQUEST_FAILED", 502, {
      url,
      status,
    });
  }
}

/** EDGAR answered 200 with a payload that does not match the expected shape. */
export class SecResponseError extends AppError {
  constructor(url: string, reason: string) {
    super(`Unexpected SEC response from ${url}: ${reason}`, "SEC_RESPONSE_INVALID", 502, {
      url,
      reason,
    });
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
