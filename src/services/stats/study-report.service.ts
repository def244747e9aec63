/**
 * Study Report Service
 * Summary of deck progress for a statistics screen
 */
import type { StudyReport } from "../../types";
import type { DeckStore } from "../deck/deck-store.service";

function roundTo(value: number, digits: number): number {
	const factor = 10 ** digits;
	return Math.round(value * factor) / factor;
}

/**
 * Build a report from the deck's current accessors
 * - averageDifficulty: mean intrinsic difficulty, 2 decimals (0 for an empty deck)
 * - completionPercentage: seen / total * 100, 1 decimal (0 for an empty deck)
 */
export function generateStudyReport(deck: DeckStore, now: Date = new Date()): StudyReport {
	const cards = deck.allCards();
	const totalCards = cards.length;
	const seenCards = deck.seenCards().length;
	const difficultySum = cards.reduce((sum, card) => sum + card.difficulty, 0);

	return {
		totalCards,
		favoriteCards: deck.favoriteCards().length,
		seenCards,
		unseenCards: totalCards - seenCards,
		dueCards: deck.dueForReview(now).length,
		categories: deck.getCategories().slice(1),
		averageDifficulty: totalCards === 0 ? 0 : roundTo(difficultySum / totalCards, 2),
		completionPercentage: totalCards === 0 ? 0 : roundTo((seenCards / totalCards) * 100, 1),
		lastUpdated: now.toISOString(),
	};
}
