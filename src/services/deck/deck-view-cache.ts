/**
 * Deck View Cache
 * Derived card lists owned by the deck store
 *
 * One generation counter covers every view: any write calls invalidate(),
 * which drops all views at once. Views are rebuilt lazily on the next read,
 * and repeated reads between writes return the same array.
 */
import type { Card } from "../../types";

export class DeckViewCache {
	private generation = 0;
	private favorites: readonly Card[] | null = null;
	private seen: readonly Card[] | null = null;
	private baseline: readonly Card[] | null = null;
	private byCategory: Map<string, readonly Card[]> = new Map();
	private buildCount = 0;

	/**
	 * Current generation; bumps on every invalidation
	 */
	getGeneration(): number {
		return this.generation;
	}

	/**
	 * Number of views built since creation (for diagnostics and tests)
	 */
	getBuildCount(): number {
		return this.buildCount;
	}

	invalidate(): void {
		this.generation++;
		this.favorites = null;
		this.seen = null;
		this.baseline = null;
		this.byCategory.clear();
	}

	getFavorites(cards: readonly Card[]): readonly Card[] {
		if (!this.favorites) {
			this.favorites = this.build(cards, (card) => card.isFavorite);
		}
		return this.favorites;
	}

	getSeen(cards: readonly Card[]): readonly Card[] {
		if (!this.seen) {
			this.seen = this.build(cards, (card) => card.seen);
		}
		return this.seen;
	}

	getBaseline(cards: readonly Card[], category: string): readonly Card[] {
		if (!this.baseline) {
			this.baseline = this.getCategory(cards, category);
		}
		return this.baseline;
	}

	getCategory(cards: readonly Card[], category: string): readonly Card[] {
		let view = this.byCategory.get(category);
		if (!view) {
			view = this.build(cards, (card) => card.category === category);
			this.byCategory.set(category, view);
		}
		return view;
	}

	private build(cards: readonly Card[], predicate: (card: Card) => boolean): readonly Card[] {
		this.buildCount++;
		return cards.filter(predicate);
	}
}
