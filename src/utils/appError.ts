/**
 * Operational Error Class
 *
 * Distinguishes expected failures (invalid input, missing row, limit reached)
 * from programming errors. The Express error handler answers these with
 * their status code; anything else becomes a 500.
 */
export class AppError extends Error {
    public readonly statusCode: number;
    public readonly isOperational: boolean;

    constructor(message: string, statusCode: number) {
        super(message);
        this.name = 'AppError';
        this.statusCode = statusCode;
        this.isOperational = true;

        Error.captureStackTrace(this, this.constructor);
    }
}

export function isAppError(err: unknown): err is AppError {
    return err instanceof AppError;
}
