/**
 * Card types
 * A card is an immutable value: lexical content plus learning state.
 * The deck store replaces card objects on every change.
 */

/**
 * Author-provided content of a card. Never changes after creation.
 */
export interface CardContent {
	readonly chinese: string;
	readonly pinyin: string;
	readonly english: string;
	readonly french: string;
	/** Romanized pronunciation hint, e.g. "choo" for 去 */
	readonly pronunciation: string;
	/** Free-text category label */
	readonly category: string;
	/** Intrinsic difficulty assigned by the author (1-5) */
	readonly difficulty: number;
	readonly exampleSentence: string;
	readonly examplePinyin: string;
	readonly exampleTranslation: string;
}

/**
 * Learning state adjusted while studying
 */
export interface LearningState {
	readonly isFavorite: boolean;
	readonly seen: boolean;
	/** Times this card has been graded */
	readonly reviewCount: number;
	/** ISO timestamp of the last grading */
	readonly lastReviewed: string | null;
	/** ISO timestamp when the card is next due */
	readonly nextReviewDate: string | null;
	/** Scheduler-adjusted difficulty (1-5), not the intrinsic difficulty */
	readonly learnedDifficulty: number;
	/** Consecutive correct gradings */
	readonly streakCount: number;
}

export interface Card extends CardContent, LearningState {
	readonly id: string;
}

/**
 * Input accepted by DeckStore.addCard
 * Example sentence fields are optional and default to ""
 */
export type NewCardContent = Omit<
	CardContent,
	"exampleSentence" | "examplePinyin" | "exampleTranslation"
> &
	Partial<Pick<CardContent, "exampleSentence" | "examplePinyin" | "exampleTranslation">>;

/**
 * Running score of the active quiz session
 */
export interface QuizScore {
	correct: number;
	total: number;
}

export const MIN_DIFFICULTY = 1;
export const MAX_DIFFICULTY = 5;

/**
 * Learning state of a card that has never been studied
 */
export const DEFAULT_LEARNING_STATE: LearningState = {
	isFavorite: false,
	seen: false,
	reviewCount: 0,
	lastReviewed: null,
	nextReviewDate: null,
	learnedDifficulty: MIN_DIFFICULTY,
	streakCount: 0,
};

export function clampDifficulty(value: number): number {
	if (!Number.isFinite(value)) {
		return MIN_DIFFICULTY;
	}
	return Math.min(MAX_DIFFICULTY, Math.max(MIN_DIFFICULTY, Math.round(value)));
}

/**
 * Two cards are the same card when their ids match
 */
export function isSameCard(a: Pick<Card, "id">, b: Pick<Card, "id">): boolean {
	return a.id === b.id;
}
