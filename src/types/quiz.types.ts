/**
 * Quiz types
 */
import type { Card } from "./card.types";

/**
 * What a quiz question asks for
 * - "pinyin": pick the transcription of the shown characters
 * - "english": pick the translation of the shown characters
 */
export type QuizQuestionKind = "pinyin" | "english";

/**
 * A multiple-choice question about one card
 */
export interface QuizQuestion {
	cardId: string;
	kind: QuizQuestionKind;
	/** The characters shown to the learner */
	prompt: string;
	/** Four options (fewer when the deck has too few distinct values) */
	options: string[];
	correctAnswer: string;
}

/**
 * Result of grading one answer
 */
export interface QuizAnswerResult {
	cardId: string;
	answer: string;
	correctAnswer: string;
	isCorrect: boolean;
}

/**
 * Source of uniformly distributed numbers in [0, 1)
 */
export type RandomSource = () => number;

/**
 * State of a running quiz session
 */
export interface QuizSessionState {
	cards: Card[];
	currentIndex: number;
	question: QuizQuestion | null;
	selectedAnswer: string | null;
	lastResult: QuizAnswerResult | null;
	isComplete: boolean;
}
