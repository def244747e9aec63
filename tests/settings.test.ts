/**
 * Tests for settings resolution
 */
import { describe, it, expect } from "vitest";
import { getDataFilePath, loadSettingsFile, resolveSettings } from "../src/settings";
import { DEFAULT_SETTINGS } from "../src/constants";
import { ConfigurationError } from "../src/errors";
import { MemoryStorageAdapter } from "./services/mocks/memory-storage.adapter";

describe("resolveSettings", () => {
	it("should return the defaults without overrides", () => {
		expect(resolveSettings()).toEqual(DEFAULT_SETTINGS);
	});

	it("should merge overrides over the defaults", () => {
		expect(resolveSettings({ quizSize: 5, maxBackups: 0 })).toEqual({
			...DEFAULT_SETTINGS,
			quizSize: 5,
			maxBackups: 0,
		});
	});

	it("should throw ConfigurationError naming the invalid key", () => {
		try {
			resolveSettings({ quizSize: 0 });
			expect.fail("should have thrown");
		} catch (error) {
			expect(error).toBeInstanceOf(ConfigurationError);
			if (error instanceof ConfigurationError) {
				expect(error.configKey).toBe("quizSize");
				expect(error.isRecoverable).toBe(false);
			}
		}
	});

	it("should reject a data file name with a folder in it", () => {
		expect(() => resolveSettings({ dataFileName: "nested/cards.json" })).toThrow(ConfigurationError);
	});
});

describe("loadSettingsFile", () => {
	it("should use the defaults when the file is missing", async () => {
		expect(await loadSettingsFile(new MemoryStorageAdapter(), "/config/deck.json")).toEqual(DEFAULT_SETTINGS);
	});

	it("should read values from the file", async () => {
		const adapter = new MemoryStorageAdapter();
		adapter.putFile("/config/deck.json", JSON.stringify({ dataFolder: "/srv/deck", baselineCategory: "Numbers" }));

		const settings = await loadSettingsFile(adapter, "/config/deck.json");

		expect(settings).toEqual({ ...DEFAULT_SETTINGS, dataFolder: "/srv/deck", baselineCategory: "Numbers" });
		expect(getDataFilePath(settings)).toBe("/srv/deck/flashcards.json");
	});

	it("should reject a file that is not a JSON object", async () => {
		const adapter = new MemoryStorageAdapter();
		adapter.putFile("/config/deck.json", "[1, 2]");

		await expect(loadSettingsFile(adapter, "/config/deck.json")).rejects.toBeInstanceOf(ConfigurationError);
	});

	it("should reject malformed JSON", async () => {
		const adapter = new MemoryStorageAdapter();
		adapter.putFile("/config/deck.json", "{ quizSize: ");

		await expect(loadSettingsFile(adapter, "/config/deck.json")).rejects.toThrow(/^Cannot read \/config\/deck\.json: /);
	});
});
