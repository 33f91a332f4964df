import pino from 'pino';

/**
 * Logger Interface
 *
 * Defines the contract for logging operations across the application.
 * Every call carries a structured payload followed by a short message.
 */
export interface ILogger {
    info(data: Record<string, unknown>, message: string): void;
    error(data: Record<string, unknown>, message: string): void;
    warn(data: Record<string, unknown>, message: string): void;
    debug(data: Record<string, unknown>, message: string): void;
}

const nodeEnv = process.env.NODE_ENV || 'development';
const prettyPrint = nodeEnv !== 'production' && nodeEnv !== 'test';

/**
 * Logger Configuration
 *
 * JSON logger for the screening service. Pretty-printed during local
 * development, raw JSON lines in production and under test.
 */
export const logger = pino({
    level: process.env.LOG_LEVEL || 'info',
    ...(prettyPrint ? {
        transport: {
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname',
                singleLine: false
            }
        }
    } : {}),
    redact: ['apiKey', 'credential', '*.apiKey', '*.credential'],
    serializers: {
        req: pino.stdSerializers.req,
        res: pino.stdSerializers.res,
        err: pino.stdSerializers.err
    }
});

/**
 * Normalizes an unknown thrown value into loggable fields.
 */
export function errorFields(error: unknown): Record<string, unknown> {
    if (error instanceof Error) {
        return { error: error.message, errorName: error.name };
    }
    return { error: String(error) };
}
