/**
 * Review Scheduler
 * Spaced-repetition rules for a graded card
 *
 * - correct: streak + 1, learned difficulty + 1 (max 5)
 * - incorrect: streak reset to 0, learned difficulty - 1 (min 1)
 * - interval (days) = learnedDifficulty * (1 + min(streak, 5))
 *
 * A simple monotone rule, not SM-2 or FSRS.
 */
import { DAY_MS, STREAK_INTERVAL_CAP } from "../../constants";
import { MAX_DIFFICULTY, MIN_DIFFICULTY, type Card } from "../../types";

/**
 * New scheduling values for a graded card
 */
export interface ReviewGrade {
	learnedDifficulty: number;
	streakCount: number;
	intervalDays: number;
	/** ISO timestamp */
	nextReviewDate: string;
}

/**
 * Days until the next review
 */
export function reviewIntervalDays(learnedDifficulty: number, streakCount: number): number {
	return learnedDifficulty * (1 + Math.min(streakCount, STREAK_INTERVAL_CAP));
}

/**
 * Grade a review outcome
 * Pure: the card is not modified
 */
export function gradeReview(
	card: Pick<Card, "learnedDifficulty" | "streakCount">,
	wasCorrect: boolean,
	now: Date
): ReviewGrade {
	const streakCount = wasCorrect ? card.streakCount + 1 : 0;
	const learnedDifficulty = wasCorrect
		? Math.min(MAX_DIFFICULTY, card.learnedDifficulty + 1)
		: Math.max(MIN_DIFFICULTY, card.learnedDifficulty - 1);
	const intervalDays = reviewIntervalDays(learnedDifficulty, streakCount);

	return {
		learnedDifficulty,
		streakCount,
		intervalDays,
		nextReviewDate: new Date(now.getTime() + intervalDays * DAY_MS).toISOString(),
	};
}

/**
 * Card after applying a grade
 */
export function applyReviewGrade(card: Card, grade: ReviewGrade, now: Date): Card {
	return {
		...card,
		learnedDifficulty: grade.learnedDifficulty,
		streakCount: grade.streakCount,
		nextReviewDate: grade.nextReviewDate,
		lastReviewed: now.toISOString(),
		reviewCount: card.reviewCount + 1,
	};
}
