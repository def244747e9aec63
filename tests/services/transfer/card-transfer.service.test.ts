/**
 * Tests for card import and export
 */
import { describe, it, expect, afterEach, vi } from "vitest";
import {
	CSV_HEADER,
	CardTransferService,
	escapeCsvField,
	exportCardsToCSV,
	exportCardsToJSON,
	importCardsFromJSON,
	safeImportCardsFromJSON,
} from "../../../src/services/transfer/card-transfer.service";
import { FileError, ValidationError } from "../../../src/errors";
import { createTestCard, createTestDeck } from "../mocks/deck.mocks";

describe("JSON export and import", () => {
	it("should round-trip cards field for field", () => {
		const cards = [
			createTestCard({ id: "a" }),
			createTestCard({
				id: "b",
				chinese: "饭",
				pinyin: "fàn",
				english: "rice, meal",
				french: "riz",
				category: "Food",
				difficulty: 3,
				isFavorite: true,
				seen: true,
				exampleSentence: "我吃饭。",
				examplePinyin: "Wǒ chī fàn.",
				exampleTranslation: "I eat.",
				reviewCount: 4,
				lastReviewed: "2024-01-10T00:00:00.000Z",
				nextReviewDate: "2024-01-19T00:00:00.000Z",
				learnedDifficulty: 3,
				streakCount: 2,
			}),
		];

		expect(importCardsFromJSON(exportCardsToJSON(cards))).toEqual(cards);
	});

	it("should throw ValidationError for data that is not a card collection", () => {
		expect(() => importCardsFromJSON('[{"id": "a"}]')).toThrow(ValidationError);
	});

	it("should report failure without throwing in the safe variant", () => {
		expect(safeImportCardsFromJSON("oops").success).toBe(false);
	});
});

describe("CSV export", () => {
	it("should write the header and one row per card", () => {
		const csv = exportCardsToCSV([
			createTestCard({ id: "a", isFavorite: true }),
			createTestCard({ id: "b", english: "rice, meal", french: 'le "riz"', difficulty: 2, seen: true }),
		]);

		expect(csv.split("\n")).toEqual([
			CSV_HEADER,
			"猫,māo,cat,chat,Animals,1,true,false",
			'猫,māo,"rice, meal","le ""riz""",Animals,2,false,true',
		]);
	});

	it("should quote fields with line breaks", () => {
		expect(escapeCsvField("line one\nline two")).toBe('"line one\nline two"');
		expect(escapeCsvField("plain")).toBe("plain");
	});

	it("should export only the header for an empty deck", () => {
		expect(exportCardsToCSV([])).toBe("Chinese,Pinyin,English,French,Category,Difficulty,IsFavorite,Seen");
	});
});

describe("CardTransferService", () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("should export the deck to a file and import it into another deck", async () => {
		vi.spyOn(console, "log").mockImplementation(() => undefined);
		const source = await createTestDeck({
			cards: [createTestCard({ id: "a" }), createTestCard({ id: "b", category: "Food" })],
		});
		const target = await createTestDeck({ cards: [createTestCard({ id: "a" })] });
		const exporter = new CardTransferService(source.adapter, source.deck);

		await exporter.exportToFile("/exports/cards.json");
		const exported = source.adapter.files.get("/exports/cards.json") ?? "";
		target.adapter.putFile("/imports/cards.json", exported);

		const importer = new CardTransferService(target.adapter, target.deck);
		const added = await importer.importFromFile("/imports/cards.json");

		expect(added).toBe(1);
		expect(target.deck.allCards().map((card) => card.id)).toEqual(["a", "b"]);
		expect(source.adapter.files.has("/exports/cards.json.tmp")).toBe(false);
	});

	it("should export CSV when asked", async () => {
		vi.spyOn(console, "log").mockImplementation(() => undefined);
		const { adapter, deck } = await createTestDeck({ cards: [createTestCard({ id: "a" })] });

		await new CardTransferService(adapter, deck).exportToFile("/exports/cards.csv", "csv");

		expect(adapter.files.get("/exports/cards.csv")).toBe(`${CSV_HEADER}\n猫,māo,cat,chat,Animals,1,false,false`);
	});

	it("should reject with FileError when the export cannot be written", async () => {
		const { adapter, deck } = await createTestDeck({ cards: [createTestCard({ id: "a" })] });
		adapter.failingOps.add("write");

		await expect(new CardTransferService(adapter, deck).exportToFile("/exports/cards.json")).rejects.toBeInstanceOf(
			FileError
		);
	});

	it("should reject with FileError when the import file is missing", async () => {
		const { adapter, deck } = await createTestDeck({ cards: [] });

		await expect(new CardTransferService(adapter, deck).importFromFile("/nowhere.json")).rejects.toBeInstanceOf(
			FileError
		);
	});

	it("should reject with ValidationError and leave the deck unchanged for bad data", async () => {
		vi.spyOn(console, "warn").mockImplementation(() => undefined);
		const { adapter, deck } = await createTestDeck({ cards: [createTestCard({ id: "a" })] });
		adapter.putFile("/imports/bad.json", '[{"id": "x"}]');

		await expect(new CardTransferService(adapter, deck).importFromFile("/imports/bad.json")).rejects.toBeInstanceOf(
			ValidationError
		);
		expect(deck.size).toBe(1);
	});
});
