/**
 * Validators for card data
 */
import type { z } from "zod";
import {
    CardCollectionSchema,
    CardContentSchema,
    CardRecordSchema,
    type ValidCardContent,
} from "./schemas/card.schema";
import type { Card } from "../types";
import { ValidationError } from "../errors";

/**
 * Result of validation - either success with data or failure with error
 */
export type ValidationResult<T> =
    | { success: true; data: T }
    | { success: false; error: ValidationError };

/**
 * Cards left after removing repeated ids
 */
export interface DedupedCards {
    cards: Card[];
    /** Ids that appeared more than once; only the first occurrence is kept */
    duplicateIds: string[];
}

/**
 * Formats zod issues as "path: message" strings
 */
export function formatIssues(error: z.ZodError): string[] {
    return error.issues.map((issue) => {
        const path = issue.path.map(String).join(".");
        return path ? `${path}: ${issue.message}` : issue.message;
    });
}

/**
 * Validates a single card record
 *
 * @throws ValidationError if the record is invalid
 */
export function validateCardRecord(data: unknown): Card {
    const result = CardRecordSchema.safeParse(data);

    if (!result.success) {
        const errors = formatIssues(result.error);
        throw new ValidationError(`Invalid card: ${errors.join(", ")}`, "card", errors);
    }

    return result.data;
}

/**
 * Validates a whole card collection (card file or JSON export)
 * The collection is accepted or rejected as a whole
 *
 * @throws ValidationError if the data is not an array of valid cards
 */
export function validateCardCollection(data: unknown): Card[] {
    const result = CardCollectionSchema.safeParse(data);

    if (!result.success) {
        const errors = formatIssues(result.error);
        throw new ValidationError(
            `Invalid card collection: ${errors.slice(0, 5).join(", ")}`,
            "cards",
            errors
        );
    }

    return result.data;
}

/**
 * Parses a JSON document and validates it as a card collection
 *
 * @throws ValidationError on malformed JSON or invalid cards
 */
export function parseCardsJson(json: string): Card[] {
    let parsed: unknown;
    try {
        parsed = JSON.parse(json);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ValidationError(`Malformed JSON: ${reason}`, "cards");
    }
    return validateCardCollection(parsed);
}

/**
 * Parses a card collection without throwing
 */
export function safeParseCardsJson(json: string): ValidationResult<Card[]> {
    try {
        return { success: true, data: parseCardsJson(json) };
    } catch (error) {
        if (error instanceof ValidationError) {
            return { success: false, error };
        }
        throw error;
    }
}

/**
 * Keeps the first card for every id
 */
export function dedupeCardsById(cards: readonly Card[]): DedupedCards {
    const seenIds = new Set<string>();
    const duplicateIds: string[] = [];
    const unique: Card[] = [];

    for (const card of cards) {
        if (seenIds.has(card.id)) {
            duplicateIds.push(card.id);
            continue;
        }
        seenIds.add(card.id);
        unique.push(card);
    }

    return { cards: unique, duplicateIds };
}

/**
 * Validates card content entered by the learner
 * Strings are trimmed; required fields must not be blank
 *
 * @throws ValidationError if a required field is missing or blank
 */
export function validateCardContent(data: unknown): ValidCardContent {
    const result = CardContentSchema.safeParse(data);

    if (!result.success) {
        const errors = formatIssues(result.error);
        const field = result.error.issues[0]?.path.map(String).join(".");
        throw new ValidationError(errors.join(", "), field || "card", errors);
    }

    return result.data;
}
