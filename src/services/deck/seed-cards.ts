/**
 * Built-in seed set
 * Loaded on first run and by "restore default cards"
 */
import seedData from "../../data/seed-cards.json";
import type { Card } from "../../types";
import { validateCardContent } from "../../validation";
import { createCard } from "./card-factory";

/**
 * Fresh seed cards with new ids, in seed order
 */
export function buildSeedCards(createId: () => string): Card[] {
	return seedData.map((entry) => createCard(createId(), validateCardContent(entry)));
}

/**
 * Key matching a card to its seed entry regardless of id
 */
export function seedOrderKey(card: Pick<Card, "chinese" | "pinyin" | "english" | "category">): string {
	// The same characters can appear twice in a category with different glosses
	return [card.category, card.chinese, card.pinyin, card.english].join("\u0000");
}

/**
 * Seed order as key -> position
 */
export function seedOrderIndex(): Map<string, number> {
	const index = new Map<string, number>();
	seedData.forEach((entry, position) => {
		const key = seedOrderKey(entry);
		if (!index.has(key)) {
			index.set(key, position);
		}
	});
	return index;
}
