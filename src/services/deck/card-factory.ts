/**
 * Card factory
 */
import { randomUUID } from "node:crypto";
import {
	DEFAULT_LEARNING_STATE,
	clampDifficulty,
	type Card,
	type LearningState,
	type NewCardContent,
} from "../../types";

/**
 * Default id generator for new cards
 */
export function generateCardId(): string {
	return randomUUID();
}

/**
 * Build a card with default learning state
 * Empty strings are accepted and produce a blank but valid card
 */
export function createCard(id: string, content: NewCardContent): Card {
	return {
		id,
		chinese: content.chinese,
		pinyin: content.pinyin,
		english: content.english,
		french: content.french,
		pronunciation: content.pronunciation,
		category: content.category,
		difficulty: clampDifficulty(content.difficulty),
		exampleSentence: content.exampleSentence ?? "",
		examplePinyin: content.examplePinyin ?? "",
		exampleTranslation: content.exampleTranslation ?? "",
		...DEFAULT_LEARNING_STATE,
	};
}

/**
 * Same card with every learning and scheduling field back to its default
 */
export function resetLearningState(card: Card): Card {
	const reset: LearningState = DEFAULT_LEARNING_STATE;
	return { ...card, ...reset };
}
