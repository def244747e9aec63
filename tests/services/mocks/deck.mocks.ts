/**
 * Shared mock factories for deck tests
 */
import type { Card } from "../../../src/types";
import { DEFAULT_LEARNING_STATE } from "../../../src/types";
import { EventBusService } from "../../../src/services/core/event-bus.service";
import { CardFileStore } from "../../../src/services/persistence/card-file-store.service";
import { serializeCards } from "../../../src/services/persistence/card-serializer";
import { DeckStore } from "../../../src/services/deck/deck-store.service";
import type { AnyDeckEvent } from "../../../src/types";
import { MemoryStorageAdapter } from "./memory-storage.adapter";

export const TEST_FILE_PATH = "/data/flashcards.json";
export const TEST_NOW = new Date("2024-01-15T00:00:00.000Z");

/**
 * Create a card with sensible defaults
 */
export function createTestCard(overrides: Partial<Card> = {}): Card {
	return {
		id: "card-1",
		chinese: "猫",
		pinyin: "māo",
		english: "cat",
		french: "chat",
		pronunciation: "mao",
		category: "Animals",
		difficulty: 1,
		exampleSentence: "",
		examplePinyin: "",
		exampleTranslation: "",
		...DEFAULT_LEARNING_STATE,
		...overrides,
	};
}

/**
 * Sequential ids: id-1, id-2, ...
 */
export function createIdSequence(prefix = "id"): () => string {
	let next = 0;
	return () => `${prefix}-${++next}`;
}

/**
 * Deterministic RandomSource cycling through the given values
 */
export function createRandomSequence(values: number[] = [0.42, 0.13, 0.87, 0.56, 0.05, 0.71]): () => number {
	let index = 0;
	return () => {
		const value = values[index % values.length] ?? 0;
		index++;
		return value;
	};
}

export interface TestDeck {
	adapter: MemoryStorageAdapter;
	events: EventBusService;
	fileStore: CardFileStore;
	deck: DeckStore;
	/** Every event emitted since creation */
	emitted: AnyDeckEvent[];
}

export interface TestDeckOptions {
	/** Written to the card file before initialize(); omit for a missing file */
	cards?: Card[];
	debounceMs?: number;
	now?: () => Date;
	random?: () => number;
	baselineCategory?: string;
	adapter?: MemoryStorageAdapter;
	/** Set false to get a deck that has not loaded its card file yet */
	initialize?: boolean;
}

/**
 * Deck over an in-memory card file, initialized unless told otherwise
 */
export async function createTestDeck(options: TestDeckOptions = {}): Promise<TestDeck> {
	const adapter = options.adapter ?? new MemoryStorageAdapter();
	if (options.cards) {
		adapter.putFile(TEST_FILE_PATH, serializeCards(options.cards));
	}

	const events = new EventBusService();
	const emitted: AnyDeckEvent[] = [];
	events.onAll((event) => emitted.push(event));

	const fileStore = new CardFileStore(adapter, TEST_FILE_PATH, {
		debounceMs: options.debounceMs ?? 500,
		onSaveError: (error) =>
			events.emit({
				type: "store:save-failed",
				filePath: TEST_FILE_PATH,
				error: error.message,
				timestamp: 0,
			}),
	});

	const deck = new DeckStore({
		fileStore,
		events,
		baselineCategory: options.baselineCategory ?? "Basic Words",
		now: options.now ?? (() => TEST_NOW),
		random: options.random,
		createId: createIdSequence(),
	});
	if (options.initialize ?? true) {
		await deck.initialize();
	}

	return { adapter, events, fileStore, deck, emitted };
}
