/**
 * Card Transfer Service
 * JSON import/export and CSV export of the card collection
 *
 * The JSON format is the card file format, so an export can be imported
 * back field for field. CSV is export-only.
 */
import path from "node:path";
import type { Card } from "../../types";
import { ValidationError } from "../../errors";
import { parseCardsJson, safeParseCardsJson, type ValidationResult } from "../../validation";
import { asFileError } from "../../utils/error.utils";
import { serializeCards } from "../persistence/card-serializer";
import type { StorageAdapter } from "../persistence/storage-adapter";
import type { DeckStore } from "../deck/deck-store.service";

export type ExportFormat = "json" | "csv";

export const CSV_HEADER = "Chinese,Pinyin,English,French,Category,Difficulty,IsFavorite,Seen";

export function exportCardsToJSON(cards: readonly Card[]): string {
	return serializeCards(cards);
}

/**
 * @throws ValidationError on malformed JSON or invalid cards
 */
export function importCardsFromJSON(json: string): Card[] {
	return parseCardsJson(json);
}

export function safeImportCardsFromJSON(json: string): ValidationResult<Card[]> {
	return safeParseCardsJson(json);
}

/**
 * Quote a field containing a comma, quote or line break; inner quotes are doubled
 */
export function escapeCsvField(value: string): string {
	if (!/[",\r\n]/.test(value)) {
		return value;
	}
	return `"${value.replace(/"/g, '""')}"`;
}

export function exportCardsToCSV(cards: readonly Card[]): string {
	const rows = cards.map((card) =>
		[
			card.chinese,
			card.pinyin,
			card.english,
			card.french,
			card.category,
			String(card.difficulty),
			String(card.isFavorite),
			String(card.seen),
		]
			.map(escapeCsvField)
			.join(",")
	);
	return [CSV_HEADER, ...rows].join("\n");
}

export class CardTransferService {
	private adapter: StorageAdapter;
	private deck: DeckStore;

	constructor(adapter: StorageAdapter, deck: DeckStore) {
		this.adapter = adapter;
		this.deck = deck;
	}

	/**
	 * Write the deck to a file (temp file + rename)
	 *
	 * @throws FileError if the write fails
	 */
	async exportToFile(filePath: string, format: ExportFormat = "json"): Promise<void> {
		const cards = this.deck.allCards();
		const content = format === "csv" ? exportCardsToCSV(cards) : exportCardsToJSON(cards);
		const tempPath = `${filePath}.tmp`;

		try {
			await this.adapter.mkdir(path.dirname(filePath));
			await this.adapter.write(tempPath, content);
			await this.adapter.rename(tempPath, filePath);
		} catch (error) {
			throw asFileError(error, filePath, "write");
		}

		console.log(`[HanziDeck] Exported ${cards.length} cards to ${filePath}`);
	}

	/**
	 * Append the cards of a JSON export to the deck
	 * @returns Number of cards added (ids already in the deck are skipped)
	 *
	 * @throws FileError if the file cannot be read
	 * @throws ValidationError if its contents are not a card collection
	 */
	async importFromFile(filePath: string): Promise<number> {
		let content: string;
		try {
			content = await this.adapter.read(filePath);
		} catch (error) {
			throw asFileError(error, filePath, "read");
		}

		let cards: Card[];
		try {
			cards = importCardsFromJSON(content);
		} catch (error) {
			if (error instanceof ValidationError) {
				console.warn(`[HanziDeck] Rejected import from ${filePath}:`, error.message);
			}
			throw error;
		}

		const added = this.deck.importCards(cards);
		console.log(`[HanziDeck] Imported ${added} of ${cards.length} cards from ${filePath}`);
		return added;
	}
}
