import type { DeckSettings } from "./types/settings.types";

// ===== Category Sentinels =====

/** Category that selects every card; always first in the category list */
export const ALL_CATEGORY = "All";

/** Category that selects favorite cards */
export const FAVORITES_CATEGORY = "Favorites";

/** Default category used to top up quiz sessions */
export const BASIC_WORDS_CATEGORY = "Basic Words";

// ===== Persistence =====

/** Default card file name */
export const DATA_FILE_NAME = "flashcards.json";

/** Prefix of backup files created next to the card file */
export const BACKUP_PREFIX = "flashcards_backup_";

/** Delay before a pending save is written */
export const SAVE_DEBOUNCE_MS = 500;

// ===== Scheduling =====

/** Streak values above this no longer lengthen the interval */
export const STREAK_INTERVAL_CAP = 5;

export const DAY_MS = 24 * 60 * 60 * 1000;

// ===== Quiz =====

/** Cards per quiz session */
export const DEFAULT_QUIZ_SIZE = 10;

/** Wrong options offered next to the correct one */
export const QUIZ_DISTRACTOR_COUNT = 3;

// ===== Default Settings =====

export const DEFAULT_SETTINGS: DeckSettings = {
	dataFolder: ".hanzi-deck",
	dataFileName: DATA_FILE_NAME,
	saveDebounceMs: SAVE_DEBOUNCE_MS,
	quizSize: DEFAULT_QUIZ_SIZE,
	baselineCategory: BASIC_WORDS_CATEGORY,
	maxBackups: 5,
};
