/**
 * Validators for deck engine settings
 */
import { SettingsSchema } from "./schemas/settings.schema";
import { formatIssues } from "./card.validator";
import type { DeckSettings } from "../types";
import { ConfigurationError } from "../errors";

/**
 * Validates complete settings, filling defaults for missing optional keys
 *
 * @throws ConfigurationError naming the first invalid key
 */
export function validateSettings(data: unknown): DeckSettings {
    const result = SettingsSchema.safeParse(data);

    if (!result.success) {
        const configKey = result.error.issues[0]?.path.map(String).join(".");
        throw new ConfigurationError(formatIssues(result.error).join(", "), configKey || undefined);
    }

    return result.data;
}
