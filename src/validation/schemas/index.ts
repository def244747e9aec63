/**
 * Central export for all Zod schemas
 */

// Card Schemas
export {
    CardRecordSchema,
    CardCollectionSchema,
    CardContentSchema,
    type CardRecordInput,
    type ValidCardContent,
} from "./card.schema";

// Settings Schemas
export {
    SettingsSchema,
    type Settings,
    type SettingsInput,
} from "./settings.schema";
