/**
 * Card serializer
 * Writes cards with a fixed field order so saved files diff cleanly
 */
import type { Card } from "../../types";

/**
 * Persisted shape of a card, keys in on-disk order
 */
export interface CardRecord {
	id: string;
	chinese: string;
	pinyin: string;
	english: string;
	french: string;
	pronunciation: string;
	category: string;
	difficulty: number;
	isFavorite: boolean;
	seen: boolean;
	exampleSentence: string;
	examplePinyin: string;
	exampleTranslation: string;
	reviewCount: number;
	lastReviewed: string | null;
	nextReviewDate: string | null;
	learnedDifficulty: number;
	streakCount: number;
}

export function toCardRecord(card: Card): CardRecord {
	return {
		id: card.id,
		chinese: card.chinese,
		pinyin: card.pinyin,
		english: card.english,
		french: card.french,
		pronunciation: card.pronunciation,
		category: card.category,
		difficulty: card.difficulty,
		isFavorite: card.isFavorite,
		seen: card.seen,
		exampleSentence: card.exampleSentence,
		examplePinyin: card.examplePinyin,
		exampleTranslation: card.exampleTranslation,
		reviewCount: card.reviewCount,
		lastReviewed: card.lastReviewed,
		nextReviewDate: card.nextReviewDate,
		learnedDifficulty: card.learnedDifficulty,
		streakCount: card.streakCount,
	};
}

/**
 * Pretty-printed JSON array of card records
 */
export function serializeCards(cards: readonly Card[]): string {
	return JSON.stringify(cards.map(toCardRecord), null, 2);
}
