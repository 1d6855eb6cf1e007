/**
 * Error hierarchy for the automation engine.
 * Every error carries a code, a category and the pipeline point where it happened.
 */

/**
 * Error Category - High-level classification for errors
 */
export enum ErrorCategory {
    TRANSIENT = 'transient',        // Retry likely helps (network, timeout)
    PERMANENT = 'permanent',        // Retry won't help (validation, configuration)
    OPERATIONAL = 'operational'     // System issue (browser crash, pool)
}

/**
 * Failure Point - Where in the pipeline the error occurred
 */
export enum FailurePoint {
    API_VALIDATION = 'api_validation',
    STARTUP = 'startup',
    PLAN_COMPILATION = 'plan_compilation',
    SESSION_ACQUISITION = 'session_acquisition',
    PAGE_NAVIGATION = 'page_navigation',
    ELEMENT_RESOLUTION = 'element_resolution',
    ACTION_EXECUTION = 'action_execution',
    DATA_EXTRACTION = 'data_extraction',
    ENRICHMENT = 'enrichment',
    TASK_DEADLINE = 'task_deadline',
    UNKNOWN = 'unknown'
}

export type ErrorContext = Record<string, unknown>;

/**
 * Base Application Error - All custom errors extend this
 */
export class ApplicationError extends Error {
    public readonly timestamp: Date;
    public readonly context?: ErrorContext;
    public readonly category: ErrorCategory;
    public readonly failurePoint: FailurePoint;

    constructor(
        message: string,
        public readonly code: string,
        public readonly statusCode: number = 500,
        public readonly retryable: boolean = false,
        context?: ErrorContext,
        category?: ErrorCategory,
        failurePoint?: FailurePoint
    ) {
        super(message);
        this.name = this.constructor.name;
        this.timestamp = new Date();
        this.context = context;

        // Auto-classify if not provided
        this.category = category || this.autoClassifyCategory();
        this.failurePoint = failurePoint || FailurePoint.UNKNOWN;

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }

    private autoClassifyCategory(): ErrorCategory {
        if (this.retryable) {
            return ErrorCategory.TRANSIENT;
        }
        if (this.statusCode >= 400 && this.statusCode < 500) {
            return ErrorCategory.PERMANENT;
        }
        return ErrorCategory.OPERATIONAL;
    }

    toJSON() {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            statusCode: this.statusCode,
            retryable: this.retryable,
            category: this.category,
            failurePoint: this.failurePoint,
            timestamp: this.timestamp.toISOString(),
            context: this.context
        };
    }
}

// ==========================================
// Request Errors (4xx)
// ==========================================

export class ValidationError extends ApplicationError {
    constructor(message: string, public readonly validationErrors?: Array<{ field: string; message: string }>, context?: ErrorContext) {
        super(
            message,
            'VALIDATION_ERROR',
            400,
            false,
            { validationErrors, ...context },
            ErrorCategory.PERMANENT,
            FailurePoint.API_VALIDATION
        );
    }
}

export class NotFoundError extends ApplicationError {
    constructor(resource: string, identifier?: string, context?: ErrorContext) {
        const message = identifier
            ? `${resource} not found: ${identifier}`
            : `${resource} not found`;
        super(message, 'NOT_FOUND', 404, false, { resource, identifier, ...context });
    }
}

// ==========================================
// Configuration Errors (fatal at startup)
// ==========================================

export class ConfigurationError extends ApplicationError {
    constructor(message: string, context?: ErrorContext) {
        super(
            message,
            'CONFIGURATION_ERROR',
            500,
            false,
            context,
            ErrorCategory.PERMANENT,
            FailurePoint.STARTUP
        );
    }
}

/**
 * A site descriptor that cannot produce a plan. Signals a catalog defect, not a runtime condition.
 */
export class CompilationError extends ApplicationError {
    constructor(message: string, public readonly site: string, context?: ErrorContext) {
        super(
            message,
            'COMPILATION_ERROR',
            500,
            false,
            { site, ...context },
            ErrorCategory.PERMANENT,
            FailurePoint.PLAN_COMPILATION
        );
    }
}

// ==========================================
// Execution Errors
// ==========================================

/**
 * Every candidate selector for a role missed. Recorded on the step; fatal only for required steps.
 */
export class ResolutionFailure extends ApplicationError {
    constructor(
        public readonly role: string,
        public readonly candidatesTried: string[],
        context?: ErrorContext
    ) {
        super(
            `No candidate selector resolved for role '${role}' (${candidatesTried.length} tried)`,
            'RESOLUTION_FAILURE',
            500,
            true,
            { role, candidatesTried, ...context },
            ErrorCategory.TRANSIENT,
            FailurePoint.ELEMENT_RESOLUTION
        );
    }
}

export class NavigationFailure extends ApplicationError {
    constructor(public readonly url: string, reason: string, public readonly httpStatus?: number, context?: ErrorContext) {
        super(
            `Navigation failed to ${url}: ${reason}`,
            'NAVIGATION_FAILURE',
            502,
            true,
            { url, httpStatus, ...context },
            ErrorCategory.TRANSIENT,
            FailurePoint.PAGE_NAVIGATION
        );
    }
}

/**
 * The driver or browser behind a session is gone. The session must not be reused.
 */
export class SessionFailure extends ApplicationError {
    constructor(message: string, context?: ErrorContext, failurePoint?: FailurePoint) {
        super(
            message,
            'SESSION_FAILURE',
            503,
            false,
            context,
            ErrorCategory.OPERATIONAL,
            failurePoint || FailurePoint.ACTION_EXECUTION
        );
    }
}

export class TaskTimeoutError extends ApplicationError {
    constructor(taskId: string, timeoutMs: number) {
        super(
            `Task '${taskId}' exceeded its ${timeoutMs}ms ceiling`,
            'TASK_TIMEOUT',
            504,
            false,
            { taskId, timeoutMs },
            ErrorCategory.OPERATIONAL,
            FailurePoint.TASK_DEADLINE
        );
    }
}

export class ShuttingDownError extends ApplicationError {
    constructor(component: string) {
        super(
            `${component} is shutting down`,
            'SHUTTING_DOWN',
            503,
            true,
            { component },
            ErrorCategory.TRANSIENT
        );
    }
}

export class InternalServerError extends ApplicationError {
    constructor(message: string = 'Internal server error', context?: ErrorContext) {
        super(
            message,
            'INTERNAL_ERROR',
            500,
            false,
            context,
            ErrorCategory.OPERATIONAL
        );
    }
}

// ==========================================
// Error Utilities
// ==========================================

export function toApplicationError(error: unknown): ApplicationError {
    if (error instanceof ApplicationError) {
        return error;
    }
    if (error instanceof Error) {
        return new InternalServerError(error.message, { originalError: error.name });
    }
    return new InternalServerError('Unknown error occurred', { error: String(error) });
}

export function isAppError(error: unknown): error is ApplicationError {
    return error instanceof ApplicationError;
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

// ==========================================
// Error Logger
// ==========================================

import logger from '../utils/logger.js';

export function logError(error: unknown, context?: ErrorContext): void {
    const appError = toApplicationError(error);
    const logData = {
        error: {
            name: appError.name,
            message: appError.message,
            code: appError.code,
            statusCode: appError.statusCode,
            failurePoint: appError.failurePoint,
            context: appError.context
        },
        ...context
    };

    if (appError.statusCode >= 500) {
        logger.error(logData, 'Server error occurred');
    } else if (appError.statusCode >= 400) {
        logger.warn(logData, 'Client error occurred');
    } else {
        logger.info(logData, 'Error occurred');
    }
}
