/**
 * Central export for all validators
 */

// Card Validators
export {
    validateCardRecord,
    validateCardCollection,
    validateCardContent,
    parseCardsJson,
    safeParseCardsJson,
    dedupeCardsById,
    formatIssues,
    type ValidationResult,
    type DedupedCards,
} from "./card.validator";

// Settings Validators
export { validateSettings } from "./settings.validator";

// Re-export schemas and their types
export * from "./schemas";
