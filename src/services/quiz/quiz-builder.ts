/**
 * Quiz builder
 * Card selection and multiple-choice question generation
 */
import { QUIZ_DISTRACTOR_COUNT } from "../../constants";
import type { Card, QuizQuestion, QuizQuestionKind, RandomSource } from "../../types";
import { sample, shuffle } from "../../utils/random.utils";

/**
 * Pick the cards for a session of `size` questions
 *
 * Seen cards come first. When there are fewer than `size` of them, the rest is
 * filled from baseline cards not already seen; a short pool gives a short quiz.
 */
export function selectQuizCards(
	seen: readonly Card[],
	baseline: readonly Card[],
	size: number,
	random: RandomSource = Math.random
): Card[] {
	if (seen.length >= size) {
		return sample(seen, size, random);
	}

	const seenIds = new Set(seen.map((card) => card.id));
	const fallback = baseline.filter((card) => !seenIds.has(card.id));
	return [...shuffle(seen, random), ...sample(fallback, size - seen.length, random)];
}

/**
 * Even positions ask for pinyin, odd positions for the English translation
 */
export function questionKindFor(index: number): QuizQuestionKind {
	return index % 2 === 0 ? "pinyin" : "english";
}

export function expectedAnswer(card: Card, kind: QuizQuestionKind): string {
	return kind === "pinyin" ? card.pinyin : card.english;
}

/**
 * Correct answer plus up to three distinct wrong values of the same field,
 * drawn from the whole deck, in random order
 */
export function buildOptions(
	correct: string,
	kind: QuizQuestionKind,
	deck: readonly Card[],
	random: RandomSource = Math.random
): string[] {
	const pool = new Set(deck.map((card) => expectedAnswer(card, kind)));
	pool.delete(correct);
	const distractors = shuffle([...pool], random).slice(0, QUIZ_DISTRACTOR_COUNT);
	return shuffle([...distractors, correct], random);
}

export function buildQuestion(
	card: Card,
	index: number,
	deck: readonly Card[],
	random: RandomSource = Math.random
): QuizQuestion {
	const kind = questionKindFor(index);
	const correctAnswer = expectedAnswer(card, kind);
	return {
		cardId: card.id,
		kind,
		prompt: card.chinese,
		options: buildOptions(correctAnswer, kind, deck, random),
		correctAnswer,
	};
}

/**
 * Exact match; no trimming or case folding
 */
export function isCorrectAnswer(question: QuizQuestion, answer: string): boolean {
	return answer === question.correctAnswer;
}
