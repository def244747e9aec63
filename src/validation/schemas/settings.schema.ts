/**
 * Zod schemas for deck engine settings
 */
import { z } from "zod";
import { DEFAULT_SETTINGS } from "../../constants";

// ===== Settings Schema =====

/**
 * Schema for complete settings
 */
export const SettingsSchema = z.object({
    dataFolder: z.string().min(1, "Data folder cannot be empty"),
    dataFileName: z
        .string()
        .min(1, "Data file name cannot be empty")
        .regex(/^[^/\\]+\.json$/, "Data file name must be a plain .json file name")
        .default(DEFAULT_SETTINGS.dataFileName),
    saveDebounceMs: z.number().int().nonnegative().default(DEFAULT_SETTINGS.saveDebounceMs),
    quizSize: z.number().int().positive("Quiz size must be at least 1").default(DEFAULT_SETTINGS.quizSize),
    baselineCategory: z
        .string()
        .min(1, "Baseline category cannot be empty")
        .default(DEFAULT_SETTINGS.baselineCategory),
    maxBackups: z.number().int().nonnegative().default(DEFAULT_SETTINGS.maxBackups),
});

// ===== Inferred Types from Schemas =====

export type Settings = z.infer<typeof SettingsSchema>;
export type SettingsInput = z.input<typeof SettingsSchema>;
