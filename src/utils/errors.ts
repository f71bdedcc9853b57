/**
 * Standard error classes for Mocksmith
 *
 * Every failure carries a stable code and a category so front ends can tell
 * a caller mistake from a schema wiring defect without parsing messages.
 */

export enum ErrorCode {
  GENERAL_ERROR = "GENERAL_ERROR",
  // Definition errors
  DUPLICATE_SCHEMA = "DUPLICATE_SCHEMA",
  UNKNOWN_SCHEMA = "UNKNOWN_SCHEMA",
  INVALID_SCHEMA = "INVALID_SCHEMA",
  INVALID_RANGE = "INVALID_RANGE",
  EMPTY_ENUM = "EMPTY_ENUM",
  // Request errors
  REQUEST_TOO_LARGE = "REQUEST_TOO_LARGE",
  UNSUPPORTED_FORMAT = "UNSUPPORTED_FORMAT",
  AMBIGUOUS_REQUEST = "AMBIGUOUS_REQUEST",
  UNKNOWN_ENTITY = "UNKNOWN_ENTITY",
  // Safety errors
  UNSAFE_IDENTIFIER = "UNSAFE_IDENTIFIER",
  UNSAFE_LITERAL = "UNSAFE_LITERAL",
  UNSAFE_STATEMENT = "UNSAFE_STATEMENT",
  // Ambient
  CONFIG_ERROR = "CONFIG_ERROR",
  FILE_IO_ERROR = "FILE_IO_ERROR",
}

export type ErrorCategory = "definition" | "request" | "safety" | "config" | "io" | "general";

export type ErrorDetails = Record<string, unknown>;

export interface ErrorResponse {
  status: "error";
  phase: string;
  error: {
    code: ErrorCode;
    category: ErrorCategory;
    message: string;
    details?: ErrorDetails;
    cause?: string;
  };
}

export class MocksmithError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: ErrorDetails,
    options?: ErrorOptions,
    public readonly category: ErrorCategory = "general",
  ) {
    super(message, options);
    this.name = "MocksmithError";
  }

  /**
   * Convert error to a format suitable for CLI output
   */
  toResponse(phase: string): ErrorResponse {
    return {
      status: "error",
      phase,
      error: {
        code: this.code,
        category: this.category,
        message: this.message,
        ...(this.details ? { details: this.details } : {}),
        ...(this.cause ? { cause: String(this.cause) } : {}),
      },
    };
  }
}

export function isMocksmithError(error: unknown): error is MocksmithError {
  return error instanceof MocksmithError;
}

// Definition errors: caller configuration mistakes

export class DuplicateSchemaError extends MocksmithError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.DUPLICATE_SCHEMA, message, details, options, "definition");
    this.name = "DuplicateSchemaError";
  }
}

export class UnknownSchemaError extends MocksmithError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.UNKNOWN_SCHEMA, message, details, options, "definition");
    this.name = "UnknownSchemaError";
  }
}

export class InvalidSchemaError extends MocksmithError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.INVALID_SCHEMA, message, details, options, "definition");
    this.name = "InvalidSchemaError";
  }
}

export class InvalidRangeError extends MocksmithError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.INVALID_RANGE, message, details, options, "definition");
    this.name = "InvalidRangeError";
  }
}

export class EmptyEnumError extends MocksmithError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.EMPTY_ENUM, message, details, options, "definition");
    this.name = "EmptyEnumError";
  }
}

// Request errors: surfaced with enough detail to correct the request

export class RequestTooLargeError extends MocksmithError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.REQUEST_TOO_LARGE, message, details, options, "request");
    this.name = "RequestTooLargeError";
  }
}

export class UnsupportedFormatError extends MocksmithError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.UNSUPPORTED_FORMAT, message, details, options, "request");
    this.name = "UnsupportedFormatError";
  }
}

export class AmbiguousRequestError extends MocksmithError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.AMBIGUOUS_REQUEST, message, details, options, "request");
    this.name = "AmbiguousRequestError";
  }
}

export class UnknownEntityError extends MocksmithError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.UNKNOWN_ENTITY, message, details, options, "request");
    this.name = "UnknownEntityError";
  }
}

// Safety errors: schema wiring defects, fatal for the whole batch

export class UnsafeIdentifierError extends MocksmithError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.UNSAFE_IDENTIFIER, message, details, options, "safety");
    this.name = "UnsafeIdentifierError";
  }
}

export class UnsafeLiteralError extends MocksmithError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.UNSAFE_LITERAL, message, details, options, "safety");
    this.name = "UnsafeLiteralError";
  }
}

export class UnsafeStatementError extends MocksmithError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.UNSAFE_STATEMENT, message, details, options, "safety");
    this.name = "UnsafeStatementError";
  }
}

// Ambient errors

export class ConfigError extends MocksmithError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.CONFIG_ERROR, message, details, options, "config");
    this.name = "ConfigError";
  }
}

export class FileIOError extends MocksmithError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.FILE_IO_ERROR, message, details, options, "io");
    this.name = "FileIOError";
  }
}
