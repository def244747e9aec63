/**
 * Study report types
 */

export interface StudyReport {
	totalCards: number;
	favoriteCards: number;
	seenCards: number;
	unseenCards: number;
	dueCards: number;
	/** Distinct categories, sorted */
	categories: string[];
	/** Mean intrinsic difficulty, 0 for an empty deck */
	averageDifficulty: number;
	/** Seen cards as a percentage of all cards */
	completionPercentage: number;
	lastUpdated: string;
}
