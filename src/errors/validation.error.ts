/**
 * Data, configuration and file error classes
 */
import { AppError } from "./base.error";

/**
 * Thrown when card data or user input fails validation
 */
export class ValidationError extends AppError {
    constructor(
        message: string,
        public readonly field?: string,
        public readonly details: string[] = []
    ) {
        super(message, "VALIDATION_ERROR");
    }

    override toUserMessage(): string {
        if (this.field) {
            return `Invalid ${this.field}: ${this.message}`;
        }
        return `Validation error: ${this.message}`;
    }
}

/**
 * Thrown when settings are missing or out of range
 */
export class ConfigurationError extends AppError {
    constructor(
        message: string,
        public readonly configKey?: string
    ) {
        super(message, "CONFIGURATION_ERROR", { recoverable: false });
    }

    override toUserMessage(): string {
        if (this.configKey) {
            return `Invalid setting: ${this.configKey}. ${this.message}`;
        }
        return `Configuration error: ${this.message}`;
    }
}

export type FileOperation = "read" | "write" | "delete" | "copy";

/**
 * Thrown when a storage operation fails
 */
export class FileError extends AppError {
    constructor(
        message: string,
        public readonly filePath?: string,
        public readonly operation?: FileOperation,
        cause?: unknown
    ) {
        super(message, "FILE_ERROR", { cause });
    }

    override toUserMessage(): string {
        const opName = this.operation
            ? { read: "reading", write: "writing", delete: "deleting", copy: "copying" }[this.operation]
            : "accessing";

        if (this.filePath) {
            return `Error ${opName} file: ${this.filePath}`;
        }
        return `File operation error: ${this.message}`;
    }
}
