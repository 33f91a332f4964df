import { Response } from "express";
import { z } from "zod";
import { logger, errorFields } from "../config/logger";
import { AppError, ValidationError } from "../utils/errors";

export function zodDetails(error: z.ZodError): Array<{ field: string; message: string }> {
    return error.errors.map(issue => ({
        field: issue.path.join('.') || 'body',
        message: issue.message
    }));
}

/**
 * Maps a failure to its HTTP response: validation problems to 400 with
 * field details, known AppErrors to their status, anything else to 500.
 */
export function sendError(res: Response, error: unknown, action: string): Response {
    if (error instanceof z.ZodError) {
        return res.status(400).json({
            error: 'Validation failed',
            details: zodDetails(error)
        });
    }

    if (error instanceof ValidationError) {
        return res.status(error.statusCode).json({
            error: error.message,
            code: error.code,
            details: error.details
        });
    }

    if (error instanceof AppError) {
        return res.status(error.statusCode).json({
            error: error.message,
            code: error.code
        });
    }

    logger.error({ action, ...errorFields(error) }, 'Request failed');
    return res.status(500).json({
        error: `${action} failed`,
        message: error instanceof Error ? error.message : 'Unknown error'
    });
}
