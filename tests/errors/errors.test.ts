/**
 * Tests for error classes and helpers
 */
import { describe, it, expect } from "vitest";
import {
	AppError,
	ConfigurationError,
	FileError,
	ValidationError,
	getUserMessage,
	isAppError,
} from "../../src/errors";
import { asFileError, formatErrorMessage, getErrorMessage } from "../../src/utils/error.utils";

describe("error classes", () => {
	it("should carry codes and names", () => {
		const error = new FileError("disk full", "/data/flashcards.json", "write");

		expect(error).toBeInstanceOf(AppError);
		expect(error.name).toBe("FileError");
		expect(error.code).toBe("FILE_ERROR");
		expect(error.isRecoverable).toBe(true);
	});

	it("should describe file errors by operation", () => {
		expect(new FileError("disk full", "/data/flashcards.json", "write").toUserMessage()).toBe(
			"Error writing file: /data/flashcards.json"
		);
		expect(new FileError("gone").toUserMessage()).toBe("File operation error: gone");
	});

	it("should mark configuration errors as not recoverable", () => {
		expect(new ConfigurationError("bad").isRecoverable).toBe(false);
		expect(new ValidationError("bad").isRecoverable).toBe(true);
	});

	it("should describe validation and configuration errors", () => {
		expect(new ValidationError("too short", "pinyin").toUserMessage()).toBe("Invalid pinyin: too short");
		expect(new ConfigurationError("must be positive", "quizSize").toUserMessage()).toBe(
			"Invalid setting: quizSize. must be positive"
		);
	});
});

describe("error helpers", () => {
	it("should recognise app errors", () => {
		expect(isAppError(new ValidationError("x"))).toBe(true);
		expect(isAppError(new Error("x"))).toBe(false);
	});

	it("should pick a user message for any thrown value", () => {
		expect(getUserMessage(new ValidationError("bad"))).toBe("Validation error: bad");
		expect(getUserMessage(new Error("plain"))).toBe("plain");
		expect(getUserMessage(42)).toBe("42");
	});

	it("should format messages with context", () => {
		expect(getErrorMessage("text")).toBe("text");
		expect(formatErrorMessage("save cards", new Error("disk full"))).toBe("Failed to save cards: disk full");
	});

	it("should wrap storage failures in a FileError that keeps the cause", () => {
		const cause = new Error("EACCES: permission denied");

		const error = asFileError(cause, "/data/flashcards.json", "write");

		expect(error).toBeInstanceOf(FileError);
		expect(error.message).toBe("EACCES: permission denied");
		expect(error.filePath).toBe("/data/flashcards.json");
		expect(error.operation).toBe("write");
		expect(error.cause).toBe(cause);
	});

	it("should pass an existing FileError through unchanged", () => {
		const original = new FileError("gone", "/data/a.json", "read");

		expect(asFileError(original, "/data/b.json", "copy")).toBe(original);
	});
});
