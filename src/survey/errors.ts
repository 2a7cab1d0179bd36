export type SurveyErrorCode =
  | 'NOT_FOUND'
  | 'DUPLICATE_SESSION'
  | 'DUPLICATE_GATEWAY_CALL_ID'
  | 'VERSION_CONFLICT'
  | 'UNKNOWN_CALL_ID'
  | 'CONTENTION'
  | 'STAGE_TIMEOUT'
  | 'GATEWAY_ERROR'
  | 'TRANSCRIPTION_ERROR'
  | 'DETECTION_ERROR'
  | 'TRANSLATION_ERROR'
  | 'SYNTHESIS_ERROR';

export class SurveyError extends Error {
  public readonly code: SurveyErrorCode;
  public readonly statusCode: number;
  public readonly retryable: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: SurveyErrorCode,
    options: { statusCode?: number; retryable?: boolean; context?: Record<string, unknown> } = {},
  ) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = options.statusCode ?? 500;
    this.retryable = options.retryable ?? false;
    this.context = options.context;
  }
}

export class NotFoundError extends SurveyError {
  constructor(resource: string, id: string) {
    super(`${resource} '${id}' not found`, 'NOT_FOUND', { statusCode: 404, context: { resource, id } });
  }
}

export class DuplicateSessionError extends SurveyError {
  constructor(sessionId: string) {
    super(`session '${sessionId}' already exists`, 'DUPLICATE_SESSION', {
      statusCode: 409,
      context: { sessionId },
    });
  }
}

export class DuplicateGatewayCallIdError extends SurveyError {
  constructor(gatewayCallId: string, ownerSessionId?: string) {
    super(`gateway call '${gatewayCallId}' is bound to another session`, 'DUPLICATE_GATEWAY_CALL_ID', {
      statusCode: 409,
      context: { gatewayCallId, ownerSessionId },
    });
  }
}

export class VersionConflictError extends SurveyError {
  constructor(sessionId: string, expectedVersion: number, actualVersion?: number) {
    super(`session '${sessionId}' version conflict`, 'VERSION_CONFLICT', {
      statusCode: 409,
      retryable: true,
      context: { sessionId, expectedVersion, actualVersion },
    });
  }
}

export class UnknownCallIdError extends SurveyError {
  constructor(gatewayCallId: string) {
    super(`no session for gateway call '${gatewayCallId}'`, 'UNKNOWN_CALL_ID', {
      statusCode: 404,
      context: { gatewayCallId },
    });
  }
}

export class ContentionError extends SurveyError {
  constructor(sessionId: string, attempts: number) {
    super(`session '${sessionId}' still contended after ${attempts} attempts`, 'CONTENTION', {
      statusCode: 503,
      context: { sessionId, attempts },
    });
  }
}

export class StageTimeoutError extends SurveyError {
  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`, 'STAGE_TIMEOUT', {
      retryable: true,
      context: { label, timeoutMs },
    });
  }
}

export class GatewayError extends SurveyError {
  constructor(action: string, message: string, context: Record<string, unknown> = {}) {
    super(`gateway ${action} failed: ${message}`, 'GATEWAY_ERROR', {
      statusCode: 502,
      context: { action, ...context },
    });
  }
}

export class TranscriptionError extends SurveyError {
  constructor(message: string, retryable = true) {
    super(message, 'TRANSCRIPTION_ERROR', { retryable });
  }
}

export class DetectionError extends SurveyError {
  constructor(message: string, retryable = true) {
    super(message, 'DETECTION_ERROR', { retryable });
  }
}

export class TranslationError extends SurveyError {
  constructor(message: string, retryable = true) {
    super(message, 'TRANSLATION_ERROR', { retryable });
  }
}

export class SynthesisError extends SurveyError {
  constructor(message: string, retryable = true) {
    super(message, 'SYNTHESIS_ERROR', { retryable });
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
