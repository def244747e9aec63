/**
 * Event Types for deck observers
 *
 * The deck engine only signals that something changed; observers
 * (a UI layer, a logger) re-read the accessors they care about.
 */

/**
 * All possible event types
 */
export type DeckEventType =
	| "card:added"
	| "card:updated"
	| "card:removed"
	| "card:reviewed"
	| "cards:bulk-change"
	| "categories:changed"
	| "quiz:score-changed"
	| "store:loaded"
	| "store:saved"
	| "store:save-failed";

/**
 * Base event interface
 */
export interface DeckEvent {
	type: DeckEventType;
	timestamp: number;
}

/**
 * Emitted when a card is created through addCard
 */
export interface CardAddedEvent extends DeckEvent {
	type: "card:added";
	cardId: string;
	category: string;
}

/**
 * Emitted when a card's favorite or seen flag changes
 */
export interface CardUpdatedEvent extends DeckEvent {
	type: "card:updated";
	cardId: string;
	changes: {
		favorite?: boolean;
		seen?: boolean;
	};
}

/**
 * Emitted when cards are deleted
 */
export interface CardRemovedEvent extends DeckEvent {
	type: "card:removed";
	cardIds: string[];
}

/**
 * Emitted when a card is graded
 */
export interface CardReviewedEvent extends DeckEvent {
	type: "card:reviewed";
	cardId: string;
	wasCorrect: boolean;
	learnedDifficulty: number;
	streakCount: number;
	nextReviewDate: string;
}

/**
 * Emitted for operations touching many cards at once
 */
export interface BulkChangeEvent extends DeckEvent {
	type: "cards:bulk-change";
	action: "imported" | "replaced" | "reset-progress" | "reset-favorites" | "shuffled" | "reordered";
	cardCount: number;
}

/**
 * Emitted when the derived category list changes
 */
export interface CategoriesChangedEvent extends DeckEvent {
	type: "categories:changed";
	categories: string[];
}

/**
 * Emitted when the running quiz score changes
 */
export interface QuizScoreChangedEvent extends DeckEvent {
	type: "quiz:score-changed";
	correct: number;
	total: number;
}

/**
 * Emitted after the collection has been (re)loaded
 */
export interface StoreLoadedEvent extends DeckEvent {
	type: "store:loaded";
	source: "file" | "seed";
	cardCount: number;
}

/**
 * Emitted after a successful write of the card file
 */
export interface StoreSavedEvent extends DeckEvent {
	type: "store:saved";
	filePath: string;
	cardCount: number;
}

/**
 * Emitted when an automatic save fails; autosave never throws
 */
export interface StoreSaveFailedEvent extends DeckEvent {
	type: "store:save-failed";
	filePath: string;
	error: string;
}

/**
 * Union type for all events
 */
export type AnyDeckEvent =
	| CardAddedEvent
	| CardUpdatedEvent
	| CardRemovedEvent
	| CardReviewedEvent
	| BulkChangeEvent
	| CategoriesChangedEvent
	| QuizScoreChangedEvent
	| StoreLoadedEvent
	| StoreSavedEvent
	| StoreSaveFailedEvent;

/**
 * The event interface for a given type
 */
export type DeckEventOf<K extends DeckEventType> = Extract<AnyDeckEvent, { type: K }>;

/**
 * Event listener callback type
 */
export type DeckEventListener<T extends DeckEvent = AnyDeckEvent> = (event: T) => void;
