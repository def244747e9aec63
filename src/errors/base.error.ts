/**
 * Base error class for the deck engine
 */

export type AppErrorCode = "VALIDATION_ERROR" | "CONFIGURATION_ERROR" | "FILE_ERROR";

export interface AppErrorOptions {
    /** False when retrying cannot succeed without a change of input or settings */
    recoverable?: boolean;
    /** Underlying error from the storage layer or a parser */
    cause?: unknown;
}

export abstract class AppError extends Error {
    readonly isRecoverable: boolean;

    constructor(
        message: string,
        public readonly code: AppErrorCode,
        options: AppErrorOptions = {}
    ) {
        super(message, options.cause === undefined ? undefined : { cause: options.cause });
        this.name = new.target.name;
        this.isRecoverable = options.recoverable ?? true;
    }

    /**
     * Message suitable for showing to the learner
     */
    abstract toUserMessage(): string;
}
