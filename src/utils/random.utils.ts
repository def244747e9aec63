/**
 * Randomness helpers
 * Every random choice in the engine goes through an injectable RandomSource
 */
import type { RandomSource } from "../types/quiz.types";

/**
 * Fisher-Yates shuffle into a new array
 */
export function shuffle<T>(items: readonly T[], random: RandomSource = Math.random): T[] {
	const result = [...items];
	for (let i = result.length - 1; i > 0; i--) {
		const j = Math.floor(random() * (i + 1));
		const current = result[i];
		const other = result[j];
		if (current === undefined || other === undefined) {
			continue;
		}
		result[i] = other;
		result[j] = current;
	}
	return result;
}

/**
 * Uniform sample of `count` items without replacement
 */
export function sample<T>(items: readonly T[], count: number, random: RandomSource = Math.random): T[] {
	return shuffle(items, random).slice(0, Math.max(0, count));
}
