/**
 * Quiz State Manager
 * Holds the position, question and answer of a running quiz session
 */
import type { Card, QuizAnswerResult, QuizQuestion, QuizSessionState } from "../types";

/**
 * Called after every change with the new and the previous session state
 */
export type QuizStateListener = (state: QuizSessionState, prevState: QuizSessionState) => void;

export function createDefaultQuizState(): QuizSessionState {
	return {
		cards: [],
		currentIndex: 0,
		question: null,
		selectedAnswer: null,
		lastResult: null,
		isComplete: false,
	};
}

export class QuizStateManager {
	private state: QuizSessionState = createDefaultQuizState();
	private listeners = new Set<QuizStateListener>();

	getState(): QuizSessionState {
		return { ...this.state };
	}

	/**
	 * @returns Unsubscribe function
	 */
	subscribe(listener: QuizStateListener): () => void {
		this.listeners.add(listener);
		return () => this.listeners.delete(listener);
	}

	clearListeners(): void {
		this.listeners.clear();
	}

	// ===== Session control =====

	/**
	 * Begin a session; an empty card list completes immediately
	 */
	start(cards: Card[], question: QuizQuestion | null): void {
		this.replaceState({
			cards: [...cards],
			currentIndex: 0,
			question,
			selectedAnswer: null,
			lastResult: null,
			isComplete: cards.length === 0,
		});
	}

	/**
	 * Record the learner's answer for the current question
	 */
	setAnswer(result: QuizAnswerResult): void {
		this.setState({ selectedAnswer: result.answer, lastResult: result });
	}

	/**
	 * Move to another position with a freshly generated question
	 */
	moveTo(index: number, question: QuizQuestion): void {
		this.setState({
			currentIndex: index,
			question,
			selectedAnswer: null,
			lastResult: null,
			isComplete: false,
		});
	}

	complete(): void {
		this.setState({ question: null, selectedAnswer: null, isComplete: true });
	}

	reset(): void {
		this.replaceState(createDefaultQuizState());
	}

	// ===== Queries =====

	getCurrentCard(): Card | null {
		if (this.state.isComplete) {
			return null;
		}
		return this.state.cards[this.state.currentIndex] ?? null;
	}

	hasAnswered(): boolean {
		return this.state.selectedAnswer !== null;
	}

	isActive(): boolean {
		return this.state.cards.length > 0 && !this.state.isComplete;
	}

	/**
	 * 1-based position and session length
	 */
	getProgress(): { current: number; total: number } {
		const total = this.state.cards.length;
		const current = this.state.isComplete ? total : Math.min(this.state.currentIndex + 1, total);
		return { current, total };
	}

	// ===== Internals =====

	private setState(partial: Partial<QuizSessionState>): void {
		this.replaceState({ ...this.state, ...partial });
	}

	private replaceState(next: QuizSessionState): void {
		const prevState = this.state;
		this.state = next;
		for (const listener of this.listeners) {
			try {
				listener(next, prevState);
			} catch (error) {
				console.error("[HanziDeck] Quiz state listener failed:", error);
			}
		}
	}
}
