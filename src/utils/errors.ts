export interface FieldIssue {
    field: string;
    message: string;
}

/**
 * Base for errors the HTTP layer maps to a status code.
 */
export class AppError extends Error {
    constructor(
        message: string,
        public readonly statusCode: number,
        public readonly code: string
    ) {
        super(message);
        this.name = new.target.name;
    }
}

export class ValidationError extends AppError {
    constructor(message: string, public readonly details: FieldIssue[] = []) {
        super(message, 400, 'validation_failed');
    }
}

export class SessionNotFoundError extends AppError {
    constructor(sessionId: string) {
        super(`Session ${sessionId} not found`, 404, 'session_not_found');
    }
}

export class SessionStateError extends AppError {
    constructor(message: string) {
        super(message, 409, 'invalid_session_state');
    }
}

export class SessionBusyError extends AppError {
    constructor(sessionId: string) {
        super(`Session ${sessionId} is already processing a request`, 409, 'session_busy');
    }
}

export class ResumeProcessingError extends AppError {
    constructor(message: string) {
        super(message, 422, 'resume_unreadable');
    }
}

/**
 * The endpoint answered without error but the completion carried no text.
 */
export class EmptyCompletionError extends Error {
    constructor() {
        super('No content returned from chat completion');
        this.name = 'EmptyCompletionError';
    }
}
