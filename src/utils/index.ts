/**
 * Central export for utilities
 */

export { getErrorMessage, formatErrorMessage, asFileError } from "./error.utils";
export { shuffle, sample } from "./random.utils";
