/**
 * Deck Store Service
 * Sole owner and sole mutator of the card collection
 *
 * Architecture:
 * - Cards are immutable values; every change swaps in a new card and a new array,
 *   so arrays handed out by accessors never change under the caller
 * - Derived views (favorites, seen, per-category, baseline) live in DeckViewCache
 *   and are all dropped on every write, then rebuilt lazily
 * - Every write schedules a debounced save through CardFileStore
 * - Every write emits an event on the injected EventBusService
 */
import { ALL_CATEGORY, FAVORITES_CATEGORY } from "../../constants";
import type {
	BulkChangeEvent,
	Card,
	NewCardContent,
	QuizScore,
	RandomSource,
} from "../../types";
import { ConfigurationError } from "../../errors";
import { dedupeCardsById } from "../../validation";
import { formatErrorMessage } from "../../utils/error.utils";
import { shuffle } from "../../utils/random.utils";
import type { EventBusService } from "../core/event-bus.service";
import { applyReviewGrade, gradeReview } from "../core/review-scheduler.service";
import type { CardFileStore, CardLoadResult } from "../persistence/card-file-store.service";
import { createCard, generateCardId, resetLearningState } from "./card-factory";
import { DeckViewCache } from "./deck-view-cache";
import { buildSeedCards, seedOrderIndex, seedOrderKey } from "./seed-cards";

export interface DeckStoreOptions {
	fileStore: CardFileStore;
	events: EventBusService;
	/** Category whose cards top up quiz sessions */
	baselineCategory: string;
	now?: () => Date;
	random?: RandomSource;
	createId?: () => string;
}

type BulkAction = BulkChangeEvent["action"];

/**
 * Sorted distinct categories, "All" first
 */
export function computeCategories(cards: readonly Card[]): string[] {
	const unique = new Set(cards.map((card) => card.category));
	unique.delete(ALL_CATEGORY);
	return [ALL_CATEGORY, ...[...unique].sort()];
}

export class DeckStore {
	private cards: readonly Card[] = [];
	private categories: string[] = [ALL_CATEGORY];
	private quizScore: QuizScore = { correct: 0, total: 0 };
	private views = new DeckViewCache();
	private isLoaded = false;
	private loading: Promise<void> | null = null;

	private fileStore: CardFileStore;
	private events: EventBusService;
	private baselineCategory: string;
	private now: () => Date;
	private random: RandomSource;
	private createId: () => string;

	constructor(options: DeckStoreOptions) {
		this.fileStore = options.fileStore;
		this.events = options.events;
		this.baselineCategory = options.baselineCategory;
		this.now = options.now ?? (() => new Date());
		this.random = options.random ?? Math.random;
		this.createId = options.createId ?? generateCardId;
	}

	// ===== Lifecycle =====

	/**
	 * Load the card file once; concurrent callers share the same load
	 * A missing or undecodable file falls back to the seed set, which is saved right away
	 */
	initialize(): Promise<void> {
		if (this.isLoaded) {
			return Promise.resolve();
		}
		if (!this.loading) {
			this.loading = this.loadFromDisk().then(
				() => {
					this.isLoaded = true;
				},
				(error: unknown) => {
					this.loading = null;
					throw error;
				}
			);
		}
		return this.loading;
	}

	isReady(): boolean {
		return this.isLoaded;
	}

	/**
	 * Replace the in-memory collection with the card file's contents
	 * A scheduled save of the old state is dropped
	 */
	async reload(): Promise<void> {
		this.fileStore.discardPending();
		await this.fileStore.whenIdle();
		await this.loadFromDisk();
		this.isLoaded = true;
	}

	/**
	 * Write any scheduled save now
	 *
	 * @throws FileError if the write fails
	 */
	async flush(): Promise<void> {
		await this.fileStore.flush();
	}

	/**
	 * Flush and stop; autosave failures at this point are logged
	 */
	async dispose(): Promise<void> {
		try {
			await this.fileStore.flush();
		} catch (error) {
			console.error("[HanziDeck]", formatErrorMessage("save cards on shutdown", error));
		}
		this.fileStore.dispose();
	}

	private async loadFromDisk(): Promise<void> {
		const result: CardLoadResult = await this.fileStore.load();

		if (result.status === "loaded") {
			if (result.duplicateIds.length > 0) {
				console.warn(
					`[HanziDeck] Dropped ${result.duplicateIds.length} card(s) with repeated ids:`,
					result.duplicateIds
				);
			}
			this.setCollection(result.cards);
			this.emitLoaded("file");
			return;
		}

		if (result.status === "corrupt") {
			console.warn(
				`[HanziDeck] Could not load ${this.fileStore.getFilePath()}, using default cards:`,
				result.error.message
			);
		}

		this.setCollection(buildSeedCards(this.createId));
		this.emitLoaded("seed");

		try {
			await this.fileStore.saveNow(this.cards);
		} catch (error) {
			console.error("[HanziDeck]", formatErrorMessage("save default cards", error));
			this.events.emit({
				type: "store:save-failed",
				filePath: this.fileStore.getFilePath(),
				error: formatErrorMessage("save default cards", error),
				timestamp: this.timestamp(),
			});
		}
	}

	// ===== Accessors =====

	get size(): number {
		return this.cards.length;
	}

	allCards(): readonly Card[] {
		return this.cards;
	}

	getCard(id: string): Card | undefined {
		return this.cards.find((card) => card.id === id);
	}

	/**
	 * Sorted distinct categories, starting with "All"
	 */
	getCategories(): readonly string[] {
		return this.categories;
	}

	getBaselineCategory(): string {
		return this.baselineCategory;
	}

	/**
	 * Cards shown for a category selection
	 * - "All": every card in deck order
	 * - "Favorites": favorite cards
	 * - anything else: cards whose category matches exactly
	 */
	cardsForCategory(category: string): readonly Card[] {
		if (category === ALL_CATEGORY) {
			return this.cards;
		}
		if (category === FAVORITES_CATEGORY) {
			return this.views.getFavorites(this.cards);
		}
		return this.views.getCategory(this.cards, category);
	}

	favoriteCards(): readonly Card[] {
		return this.views.getFavorites(this.cards);
	}

	seenCards(): readonly Card[] {
		return this.views.getSeen(this.cards);
	}

	/**
	 * Cards of the baseline category used to top up quizzes
	 */
	basicWordCards(): readonly Card[] {
		return this.views.getBaseline(this.cards, this.baselineCategory);
	}

	/**
	 * Seen cards whose next review is unset or not later than asOf
	 */
	dueForReview(asOf: Date = this.now()): Card[] {
		const cutoff = asOf.getTime();
		return this.seenCards().filter(
			(card) => card.nextReviewDate === null || Date.parse(card.nextReviewDate) <= cutoff
		);
	}

	/**
	 * Case-insensitive text search inside a category view
	 */
	searchCards(query: string, category: string = ALL_CATEGORY): readonly Card[] {
		const cards = this.cardsForCategory(category);
		const needle = query.trim().toLowerCase();
		if (!needle) {
			return cards;
		}
		return cards.filter((card) =>
			[card.chinese, card.pinyin, card.english, card.french, card.pronunciation].some((field) =>
				field.toLowerCase().includes(needle)
			)
		);
	}

	/**
	 * Derived-view generation (for diagnostics and tests)
	 */
	getViewGeneration(): number {
		return this.views.getGeneration();
	}

	// ===== Card mutations =====

	addCard(content: NewCardContent): Card {
		const card = createCard(this.createId(), content);
		this.commit([...this.cards, card]);
		this.events.emit({
			type: "card:added",
			cardId: card.id,
			category: card.category,
			timestamp: this.timestamp(),
		});
		return card;
	}

	/**
	 * Flip the favorite flag; unknown ids are ignored
	 */
	toggleFavorite(id: string): void {
		const updated = this.updateCard(id, (card) => ({ ...card, isFavorite: !card.isFavorite }));
		if (updated) {
			this.events.emit({
				type: "card:updated",
				cardId: id,
				changes: { favorite: true },
				timestamp: this.timestamp(),
			});
		}
	}

	/**
	 * Mark a card as seen; already-seen and unknown ids are ignored
	 */
	markSeen(id: string): void {
		const updated = this.updateCard(id, (card) => (card.seen ? card : { ...card, seen: true }));
		if (updated) {
			this.events.emit({
				type: "card:updated",
				cardId: id,
				changes: { seen: true },
				timestamp: this.timestamp(),
			});
		}
	}

	/**
	 * Grade a review and reschedule the card
	 * @returns The updated card, or null for an unknown id
	 */
	recordReviewOutcome(id: string, wasCorrect: boolean): Card | null {
		const now = this.now();
		const updated = this.updateCard(id, (card) =>
			applyReviewGrade(card, gradeReview(card, wasCorrect, now), now)
		);
		if (!updated || updated.nextReviewDate === null) {
			return null;
		}

		this.events.emit({
			type: "card:reviewed",
			cardId: id,
			wasCorrect,
			learnedDifficulty: updated.learnedDifficulty,
			streakCount: updated.streakCount,
			nextReviewDate: updated.nextReviewDate,
			timestamp: this.timestamp(),
		});
		return updated;
	}

	/**
	 * Remove cards by id; unknown ids are ignored
	 * @returns Number of cards removed
	 */
	deleteCards(ids: Iterable<string>): number {
		const doomed = new Set(ids);
		const kept = this.cards.filter((card) => !doomed.has(card.id));
		const removedIds = this.cards.filter((card) => doomed.has(card.id)).map((card) => card.id);
		if (removedIds.length === 0) {
			return 0;
		}

		this.commit(kept);
		this.events.emit({ type: "card:removed", cardIds: removedIds, timestamp: this.timestamp() });
		return removedIds.length;
	}

	// ===== Bulk mutations =====

	/**
	 * Clear favorites, seen flags and scheduling on every card; content is kept
	 */
	resetAllProgress(): void {
		this.commit(this.cards.map(resetLearningState));
		this.emitBulk("reset-progress");
	}

	resetFavorites(): void {
		this.commit(this.cards.map((card) => (card.isFavorite ? { ...card, isFavorite: false } : card)));
		this.emitBulk("reset-favorites");
	}

	/**
	 * Append cards; ids already in the deck (or repeated in the batch) are skipped
	 * @returns Number of cards appended
	 */
	importCards(newCards: readonly Card[]): number {
		const existing = new Set(this.cards.map((card) => card.id));
		const { cards: unique } = dedupeCardsById(newCards);
		const fresh = unique.filter((card) => !existing.has(card.id));
		if (fresh.length === 0) {
			return 0;
		}

		this.commit([...this.cards, ...fresh]);
		this.emitBulk("imported", fresh.length);
		return fresh.length;
	}

	/**
	 * Replace the whole collection (restore defaults, shuffle, reorder)
	 * Repeated ids keep their first occurrence
	 */
	replaceAll(newCards: readonly Card[]): void {
		this.replaceCollection(newCards, "replaced");
	}

	/**
	 * Replace the collection with a fresh copy of the seed set
	 */
	resetToDefaultCards(): void {
		this.replaceCollection(buildSeedCards(this.createId), "replaced");
	}

	shuffleCards(): void {
		this.replaceCollection(shuffle(this.cards, this.random), "shuffled");
	}

	/**
	 * Put seed cards back in seed order; other cards follow in their current order
	 */
	restoreDefaultOrder(): void {
		const order = seedOrderIndex();
		const ranked = this.cards.map((card, position) => ({
			card,
			rank: order.get(seedOrderKey(card)) ?? order.size + position,
		}));
		ranked.sort((a, b) => a.rank - b.rank);
		this.replaceCollection(
			ranked.map((entry) => entry.card),
			"reordered"
		);
	}

	// ===== Quiz score =====

	getQuizScore(): QuizScore {
		return { ...this.quizScore };
	}

	resetQuiz(): void {
		this.quizScore = { correct: 0, total: 0 };
		this.emitQuizScore();
	}

	recordQuizAnswer(wasCorrect: boolean): void {
		this.quizScore = {
			correct: this.quizScore.correct + (wasCorrect ? 1 : 0),
			total: this.quizScore.total + 1,
		};
		this.emitQuizScore();
	}

	// ===== Internals =====

	/**
	 * Install a loaded collection without scheduling a save
	 */
	private setCollection(cards: readonly Card[]): void {
		this.cards = cards;
		this.views.invalidate();
		this.refreshCategories();
	}

	/**
	 * Install a changed collection: invalidate views, refresh categories, schedule a save
	 *
	 * @throws ConfigurationError before the card file has been loaded, since the save
	 * would overwrite it with a partial collection
	 */
	private commit(cards: readonly Card[]): void {
		if (!this.isLoaded) {
			throw new ConfigurationError("Deck is not loaded yet; await initialize() before changing cards");
		}
		this.setCollection(cards);
		this.fileStore.scheduleSave(() => this.cards);
	}

	private replaceCollection(cards: readonly Card[], action: BulkAction): void {
		const { cards: unique } = dedupeCardsById(cards);
		this.commit(unique);
		this.emitBulk(action);
	}

	/**
	 * Swap one card; returns null when the id is unknown or nothing changed
	 */
	private updateCard(id: string, update: (card: Card) => Card): Card | null {
		const index = this.cards.findIndex((card) => card.id === id);
		const current = this.cards[index];
		if (!current) {
			return null;
		}

		const next = update(current);
		if (next === current) {
			return null;
		}

		const cards = [...this.cards];
		cards[index] = next;
		this.commit(cards);
		return next;
	}

	private refreshCategories(): void {
		const categories = computeCategories(this.cards);
		const changed =
			categories.length !== this.categories.length ||
			categories.some((category, i) => category !== this.categories[i]);
		if (!changed) {
			return;
		}

		this.categories = categories;
		this.events.emit({
			type: "categories:changed",
			categories: [...categories],
			timestamp: this.timestamp(),
		});
	}

	private emitBulk(action: BulkAction, cardCount: number = this.cards.length): void {
		this.events.emit({ type: "cards:bulk-change", action, cardCount, timestamp: this.timestamp() });
	}

	private emitQuizScore(): void {
		this.events.emit({
			type: "quiz:score-changed",
			correct: this.quizScore.correct,
			total: this.quizScore.total,
			timestamp: this.timestamp(),
		});
	}

	private emitLoaded(source: "file" | "seed"): void {
		this.events.emit({
			type: "store:loaded",
			source,
			cardCount: this.cards.length,
			timestamp: this.timestamp(),
		});
	}

	private timestamp(): number {
		return this.now().getTime();
	}
}
