/**
 * Error message helpers for logs, events and storage failures
 */
import { FileError, type FileOperation } from "../errors";

export function getErrorMessage(error: unknown): string {
	if (error instanceof Error) {
		return error.message;
	}
	return typeof error === "string" ? error : String(error);
}

/**
 * "Failed to <action>: <reason>", as used in log lines and save-failed events
 */
export function formatErrorMessage(action: string, error: unknown): string {
	return `Failed to ${action}: ${getErrorMessage(error)}`;
}

/**
 * Wrap a storage failure in a FileError; an existing FileError passes through unchanged
 */
export function asFileError(error: unknown, filePath: string, operation: FileOperation): FileError {
	if (error instanceof FileError) {
		return error;
	}
	return new FileError(getErrorMessage(error), filePath, operation, error);
}
