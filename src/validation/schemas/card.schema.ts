/**
 * Zod schemas for card records
 *
 * The on-disk format has grown over time: learning state, scheduling and
 * example-sentence fields may be missing from older files and decode to
 * their defaults instead of failing.
 */
import { z } from "zod";
import { clampDifficulty, type Card } from "../../types/card.types";

// ===== Field Schemas =====

/**
 * Non-negative integer counter, defaults to 0
 */
const CounterSchema = z
    .number()
    .default(0)
    .transform((value) => (Number.isFinite(value) ? Math.max(0, Math.floor(value)) : 0));

/**
 * Difficulty on the 1-5 scale, rounded and clamped
 */
const DifficultySchema = z.number().transform(clampDifficulty);

/**
 * Optional ISO timestamp; anything unparseable decodes to null
 */
const TimestampSchema = z
    .string()
    .nullable()
    .default(null)
    .transform((value) => {
        if (value === null) return null;
        const ms = Date.parse(value);
        return Number.isFinite(ms) ? new Date(ms).toISOString() : null;
    });

// ===== Card Record Schema =====

/**
 * Schema for a single persisted card
 */
export const CardRecordSchema = z
    .object({
        id: z.string().min(1, "Card id cannot be empty"),
        chinese: z.string(),
        pinyin: z.string(),
        english: z.string(),
        french: z.string(),
        pronunciation: z.string(),
        category: z.string(),
        difficulty: DifficultySchema,
        isFavorite: z.boolean().default(false),
        seen: z.boolean().default(false),
        exampleSentence: z.string().default(""),
        examplePinyin: z.string().default(""),
        exampleTranslation: z.string().default(""),
        reviewCount: CounterSchema,
        lastReviewed: TimestampSchema,
        nextReviewDate: TimestampSchema,
        learnedDifficulty: z.number().default(1).transform(clampDifficulty),
        streakCount: CounterSchema,
    })
    .transform((record): Card => {
        // A card is never due before it was last reviewed
        if (
            record.lastReviewed !== null &&
            record.nextReviewDate !== null &&
            Date.parse(record.nextReviewDate) < Date.parse(record.lastReviewed)
        ) {
            return { ...record, nextReviewDate: record.lastReviewed };
        }
        return record;
    });

/**
 * Schema for a whole card file / JSON export
 */
export const CardCollectionSchema = z.array(CardRecordSchema);

// ===== Card Content Schema =====

/**
 * Schema for user-entered card content (add-card boundary)
 */
export const CardContentSchema = z.object({
    chinese: z.string().trim().min(1, "Chinese text cannot be empty"),
    pinyin: z.string().trim().min(1, "Pinyin cannot be empty"),
    english: z.string().trim().min(1, "English translation cannot be empty"),
    french: z.string().trim().min(1, "French translation cannot be empty"),
    pronunciation: z.string().trim().default(""),
    category: z.string().trim().min(1, "Category cannot be empty"),
    difficulty: z.number().int().min(1).max(5).default(1),
    exampleSentence: z.string().trim().default(""),
    examplePinyin: z.string().trim().default(""),
    exampleTranslation: z.string().trim().default(""),
});

// ===== Inferred Types from Schemas =====

export type CardRecordInput = z.input<typeof CardRecordSchema>;
export type ValidCardContent = z.infer<typeof CardContentSchema>;
