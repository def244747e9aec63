/**
 * Central export point for all error classes
 */
import { AppError } from "./base.error";

// Base error
export { AppError, type AppErrorCode, type AppErrorOptions } from "./base.error";

// Data, configuration and file errors
export {
    ValidationError,
    ConfigurationError,
    FileError,
    type FileOperation,
} from "./validation.error";

/**
 * Type guard to check if an error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
    return error instanceof AppError;
}

/**
 * Extract a message fit for the learner from any error
 */
export function getUserMessage(error: unknown): string {
    if (isAppError(error)) {
        return error.toUserMessage();
    }
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
