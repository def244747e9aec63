/**
 * Deck engine settings types
 */

/**
 * Settings for the deck engine
 */
export interface DeckSettings {
    /** Folder holding the card file and its backups */
    dataFolder: string;
    /** Name of the card file inside dataFolder */
    dataFileName: string;
    /** Window in which mutations coalesce into one write */
    saveDebounceMs: number;
    /** Number of cards in a quiz session */
    quizSize: number;
    /** Category used to top up quiz sessions when too few cards are seen */
    baselineCategory: string;
    /** Backups kept after each new backup (0 = keep all) */
    maxBackups: number;
}
