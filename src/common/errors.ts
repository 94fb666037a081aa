export class AppError extends Error {
  readonly code: string;
  readonly statusCode: number;

  constructor(message: string, code: string, statusCode: number) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
  }
}

export class AuthError extends AppError {
  constructor(message = 'Unauthorized') {
    super(message, 'UNAUTHORIZED', 401);
  }
}

export class TenantError extends AppError {
  constructor(message = 'Missing tenant scope') {
    super(message, 'TENANT_REQUIRED', 400);
  }
}

export class NotFoundError extends AppError {
  constructor(entity: string, id: string) {
    super(`${entity} ${id} not found`, 'NOT_FOUND', 404);
  }
}

export class PermissionDeniedError extends AppError {
  constructor(message = 'Permission denied') {
    super(message, 'PERMISSION_DENIED', 403);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 'VALIDATION_FAILED', 400);
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 'CONFLICT', 409);
  }
}

export class InvalidStateError extends AppError {
  constructor(message: string, code = 'INVALID_STATE') {
    super(message, code, 409);
  }
}

export class AttemptCannotStartError extends InvalidStateError {
  constructor(reason: string) {
    super(`Attempt cannot be started: ${reason}`, 'ATTEMPT_CANNOT_START');
  }
}

export class AttemptAlreadySubmittedError extends InvalidStateError {
  constructor(attemptId: string) {
    super(`Attempt ${attemptId} has already been submitted`, 'ATTEMPT_ALREADY_SUBMITTED');
  }
}

export class TimeExpiredError extends AppError {
  constructor(attemptId: string) {
    super(`Time limit for attempt ${attemptId} has expired`, 'TIME_EXPIRED', 410);
  }
}

export class GradingNotAllowedError extends AppError {
  constructor(questionType: string) {
    super(`Questions of type ${questionType} require manual grading`, 'GRADING_NOT_ALLOWED', 422);
  }
}
