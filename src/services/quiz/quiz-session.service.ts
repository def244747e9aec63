/**
 * Quiz Session Service
 * Runs a multiple-choice session over the deck and grades answers through it
 */
import type { QuizAnswerResult, QuizScore, RandomSource } from "../../types";
import type { QuizStateManager } from "../../state/quiz.state";
import type { DeckStore } from "../deck/deck-store.service";
import { buildQuestion, isCorrectAnswer, selectQuizCards } from "./quiz-builder";

export interface QuizSessionOptions {
	/** Default number of questions */
	quizSize: number;
	random?: RandomSource;
}

export class QuizSessionService {
	private deck: DeckStore;
	private state: QuizStateManager;
	private quizSize: number;
	private random: RandomSource;

	constructor(deck: DeckStore, state: QuizStateManager, options: QuizSessionOptions) {
		this.deck = deck;
		this.state = state;
		this.quizSize = options.quizSize;
		this.random = options.random ?? Math.random;
	}

	getState(): QuizStateManager {
		return this.state;
	}

	/**
	 * Start a new session and reset the running score
	 * @returns Number of questions in the session
	 */
	start(size: number = this.quizSize): number {
		const cards = selectQuizCards(
			this.deck.seenCards(),
			this.deck.basicWordCards(),
			size,
			this.random
		);
		const first = cards[0];

		this.deck.resetQuiz();
		this.state.start(
			cards,
			first ? buildQuestion(first, 0, this.deck.allCards(), this.random) : null
		);
		return cards.length;
	}

	/**
	 * Grade an answer for the current question
	 * Returns null when there is no open question or it was already answered
	 */
	answer(answer: string): QuizAnswerResult | null {
		const { question } = this.state.getState();
		if (!question || this.state.hasAnswered()) {
			return null;
		}

		const result: QuizAnswerResult = {
			cardId: question.cardId,
			answer,
			correctAnswer: question.correctAnswer,
			isCorrect: isCorrectAnswer(question, answer),
		};

		this.deck.recordQuizAnswer(result.isCorrect);
		this.deck.recordReviewOutcome(question.cardId, result.isCorrect);
		this.state.setAnswer(result);
		return result;
	}

	/**
	 * Advance; past the last card the session completes
	 */
	next(): void {
		const { cards, currentIndex, isComplete } = this.state.getState();
		if (isComplete) {
			return;
		}
		this.goTo(currentIndex + 1, cards.length);
	}

	/**
	 * Step back; from a completed session this returns to the last card
	 */
	previous(): void {
		const { cards, currentIndex, isComplete } = this.state.getState();
		const target = isComplete ? currentIndex : currentIndex - 1;
		if (target < 0 || cards.length === 0) {
			return;
		}
		this.goTo(target, cards.length);
	}

	getScore(): QuizScore {
		return this.deck.getQuizScore();
	}

	private goTo(index: number, length: number): void {
		const card = this.state.getState().cards[index];
		if (index >= length || !card) {
			this.state.complete();
			return;
		}
		this.state.moveTo(index, buildQuestion(card, index, this.deck.allCards(), this.random));
	}
}
