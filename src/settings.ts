/**
 * Settings loading
 * Overrides are merged over DEFAULT_SETTINGS and validated as a whole
 */
import path from "node:path";
import { DEFAULT_SETTINGS } from "./constants";
import { ConfigurationError } from "./errors";
import type { DeckSettings } from "./types";
import { validateSettings } from "./validation";
import { getErrorMessage } from "./utils/error.utils";
import type { StorageAdapter } from "./services/persistence/storage-adapter";

export { DEFAULT_SETTINGS };

/**
 * @throws ConfigurationError if a value is invalid
 */
export function resolveSettings(overrides: Partial<DeckSettings> = {}): DeckSettings {
	return validateSettings(Object.assign({}, DEFAULT_SETTINGS, overrides));
}

/**
 * Read settings from a JSON file; a missing file yields the defaults
 *
 * @throws ConfigurationError if the file is not a JSON object or holds invalid values
 */
export async function loadSettingsFile(
	adapter: StorageAdapter,
	filePath: string
): Promise<DeckSettings> {
	if (!(await adapter.exists(filePath))) {
		return resolveSettings();
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(await adapter.read(filePath));
	} catch (error) {
		throw new ConfigurationError(`Cannot read ${filePath}: ${getErrorMessage(error)}`);
	}

	if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
		throw new ConfigurationError(`${filePath} must contain a JSON object`);
	}

	return validateSettings({ ...DEFAULT_SETTINGS, ...parsed });
}

/**
 * Full path of the card file
 */
export function getDataFilePath(settings: DeckSettings): string {
	return path.join(settings.dataFolder, settings.dataFileName);
}
