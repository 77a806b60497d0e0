export type ErrorDetails = Record<string, unknown>;

export class AppError extends Error {
  constructor(
    public code: string,
    public status: number,
    message: string,
    public details?: ErrorDetails
  ) {
    super(message);
    this.name = "AppError";
  }
}

export type FieldReason = {
  field: string;
  reason: string;
};

export function validationError(message: string, fields?: string[]) {
  return new AppError("VALIDATION_ERROR", 400, message, fields ? { fields } : undefined);
}

export function fieldValidationError(message: string, reasons: FieldReason[]) {
  return new AppError("VALIDATION_ERROR", 400, message, {
    fields: [...new Set(reasons.map((r) => r.field))],
    reasons
  });
}

export function notFoundError(code: string, message: string) {
  return new AppError(code, 404, message);
}

export function internalError() {
  return new AppError("INTERNAL_ERROR", 500, "Unexpected error");
}

// Timeline failures never reach an HTTP caller; they are logged with their code.
export class InvalidStageDataError extends Error {
  readonly code = "INVALID_STAGE_DATA";

  constructor(
    message: string,
    public details?: ErrorDetails
  ) {
    super(message);
    this.name = "InvalidStageDataError";
  }
}

export class TransportSendFailure extends Error {
  readonly code = "TRANSPORT_SEND_FAILURE";

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "TransportSendFailure";
  }
}

export function errorBody(err: AppError | Error) {
  if (err instanceof AppError) {
    return {
      error: {
        code: err.code,
        message: err.message,
        ...(err.details ? { details: err.details } : {})
      }
    };
  }
  return { error: { code: "INTERNAL_ERROR", message: "Unexpected error" } };
}
