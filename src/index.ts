/**
 * Hanzi Deck public API
 */
export { DeckEngine, type DeckEngineOptions } from "./main";
export { resolveSettings, loadSettingsFile, getDataFilePath } from "./settings";
export * from "./constants";
export * from "./types";
export * from "./errors";
export * from "./validation";
export * from "./services";
export * from "./state";
export { getErrorMessage, formatErrorMessage, asFileError, shuffle, sample } from "./utils";
