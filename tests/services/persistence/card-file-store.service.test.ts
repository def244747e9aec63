/**
 * Tests for CardFileStore
 */
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { CardFileStore } from "../../../src/services/persistence/card-file-store.service";
import { serializeCards } from "../../../src/services/persistence/card-serializer";
import { FileError, ValidationError } from "../../../src/errors";
import { MemoryStorageAdapter } from "../mocks/memory-storage.adapter";
import { TEST_FILE_PATH, createTestCard } from "../mocks/deck.mocks";

describe("CardFileStore", () => {
	let adapter: MemoryStorageAdapter;
	let onSaved: ReturnType<typeof vi.fn>;
	let onSaveError: ReturnType<typeof vi.fn>;
	let store: CardFileStore;

	beforeEach(() => {
		adapter = new MemoryStorageAdapter();
		onSaved = vi.fn();
		onSaveError = vi.fn();
		store = new CardFileStore(adapter, TEST_FILE_PATH, { debounceMs: 500, onSaved, onSaveError });
	});

	afterEach(() => {
		vi.useRealTimers();
		vi.restoreAllMocks();
	});

	describe("load", () => {
		it("should report a missing file", async () => {
			expect(await store.load()).toEqual({ status: "missing" });
		});

		it("should report malformed JSON as corrupt", async () => {
			adapter.putFile(TEST_FILE_PATH, "[{");

			const result = await store.load();

			expect(result.status).toBe("corrupt");
			if (result.status === "corrupt") {
				expect(result.error).toBeInstanceOf(ValidationError);
			}
		});

		it("should report a read failure as corrupt", async () => {
			adapter.putFile(TEST_FILE_PATH, "[]");
			adapter.failingOps.add("read");

			const result = await store.load();

			expect(result.status).toBe("corrupt");
			if (result.status === "corrupt") {
				expect(result.error).toBeInstanceOf(FileError);
			}
		});

		it("should fill defaults for fields missing from older records", async () => {
			adapter.putFile(
				TEST_FILE_PATH,
				JSON.stringify([
					{
						id: "old-1",
						chinese: "水",
						pinyin: "shuǐ",
						english: "water",
						french: "eau",
						pronunciation: "shway",
						category: "Basic Words",
						difficulty: 1,
						isFavorite: true,
					},
				])
			);

			const result = await store.load();

			expect(result).toEqual({
				status: "loaded",
				duplicateIds: [],
				cards: [
					{
						id: "old-1",
						chinese: "水",
						pinyin: "shuǐ",
						english: "water",
						french: "eau",
						pronunciation: "shway",
						category: "Basic Words",
						difficulty: 1,
						isFavorite: true,
						seen: false,
						exampleSentence: "",
						examplePinyin: "",
						exampleTranslation: "",
						reviewCount: 0,
						lastReviewed: null,
						nextReviewDate: null,
						learnedDifficulty: 1,
						streakCount: 0,
					},
				],
			});
		});
	});

	describe("saving", () => {
		it("should write through a temp file and rename it into place", async () => {
			const cards = [createTestCard({ id: "a" })];

			await store.saveNow(cards);

			expect(adapter.files.get(TEST_FILE_PATH)).toBe(serializeCards(cards));
			expect(adapter.files.has(`${TEST_FILE_PATH}.tmp`)).toBe(false);
			expect(adapter.log).toEqual([
				`write ${TEST_FILE_PATH}.tmp`,
				`rename ${TEST_FILE_PATH}.tmp -> ${TEST_FILE_PATH}`,
			]);
			expect(onSaved).toHaveBeenCalledWith(1);
		});

		it("should write fields in a stable order", async () => {
			await store.saveNow([createTestCard({ id: "a" })]);

			const [record] = JSON.parse(adapter.files.get(TEST_FILE_PATH) ?? "[]");
			expect(Object.keys(record)).toEqual([
				"id",
				"chinese",
				"pinyin",
				"english",
				"french",
				"pronunciation",
				"category",
				"difficulty",
				"isFavorite",
				"seen",
				"exampleSentence",
				"examplePinyin",
				"exampleTranslation",
				"reviewCount",
				"lastReviewed",
				"nextReviewDate",
				"learnedDifficulty",
				"streakCount",
			]);
		});

		it("should replace an earlier scheduled save with a later one", async () => {
			vi.useFakeTimers();
			const first = vi.fn(() => [createTestCard({ id: "first" })]);
			const second = vi.fn(() => [createTestCard({ id: "second" })]);

			store.scheduleSave(first);
			await vi.advanceTimersByTimeAsync(400);
			store.scheduleSave(second);
			await vi.advanceTimersByTimeAsync(400);
			expect(store.getWriteCount()).toBe(0);

			await vi.advanceTimersByTimeAsync(100);
			await store.whenIdle();

			expect(store.getWriteCount()).toBe(1);
			expect(first).not.toHaveBeenCalled();
			expect(second).toHaveBeenCalledTimes(1);
		});

		it("should read the snapshot when the write runs", async () => {
			let cards = [createTestCard({ id: "early" })];
			store.scheduleSave(() => cards);
			cards = [createTestCard({ id: "late" })];

			await store.flush();

			expect(adapter.files.get(TEST_FILE_PATH)).toBe(serializeCards(cards));
			expect(store.hasPendingSave()).toBe(false);
		});

		it("should run writes one after another", async () => {
			const firstWrite = store.saveNow([createTestCard({ id: "a" })]);
			const secondWrite = store.saveNow([createTestCard({ id: "b" })]);
			await Promise.all([firstWrite, secondWrite]);

			expect(adapter.log).toEqual([
				`write ${TEST_FILE_PATH}.tmp`,
				`rename ${TEST_FILE_PATH}.tmp -> ${TEST_FILE_PATH}`,
				`write ${TEST_FILE_PATH}.tmp`,
				`rename ${TEST_FILE_PATH}.tmp -> ${TEST_FILE_PATH}`,
			]);
			expect(adapter.files.get(TEST_FILE_PATH)).toBe(serializeCards([createTestCard({ id: "b" })]));
		});

		it("should report an autosave failure without throwing", async () => {
			vi.useFakeTimers();
			const consoleSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
			adapter.failingOps.add("rename");

			store.scheduleSave(() => [createTestCard()]);
			await vi.advanceTimersByTimeAsync(500);
			await store.whenIdle();

			expect(onSaveError).toHaveBeenCalledTimes(1);
			const [error] = onSaveError.mock.calls[0] ?? [];
			expect(error).toBeInstanceOf(FileError);
			expect(error).toMatchObject({ filePath: TEST_FILE_PATH, operation: "write" });
			expect(consoleSpy).toHaveBeenCalledTimes(1);
			expect(onSaved).not.toHaveBeenCalled();
		});

		it("should reject an explicit flush that fails", async () => {
			adapter.failingOps.add("write");
			store.scheduleSave(() => [createTestCard()]);

			await expect(store.flush()).rejects.toBeInstanceOf(FileError);
			expect(onSaveError).not.toHaveBeenCalled();
		});

		it("should keep writing after a failed write", async () => {
			adapter.failingOps.add("write");
			await expect(store.saveNow([createTestCard({ id: "a" })])).rejects.toBeInstanceOf(FileError);

			adapter.failingOps.delete("write");
			await store.saveNow([createTestCard({ id: "b" })]);

			expect(store.getWriteCount()).toBe(1);
		});

		it("should drop a pending save on dispose", async () => {
			vi.useFakeTimers();
			store.scheduleSave(() => [createTestCard()]);

			store.dispose();
			await vi.advanceTimersByTimeAsync(1000);

			expect(store.getWriteCount()).toBe(0);
			expect(store.hasPendingSave()).toBe(false);
		});
	});
});
