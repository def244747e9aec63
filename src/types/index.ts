/**
 * Central export point for all types
 */

// Card types
export type {
    Card,
    CardContent,
    LearningState,
    NewCardContent,
    QuizScore,
} from "./card.types";
export {
    DEFAULT_LEARNING_STATE,
    MIN_DIFFICULTY,
    MAX_DIFFICULTY,
    clampDifficulty,
    isSameCard,
} from "./card.types";

// Settings types
export type { DeckSettings } from "./settings.types";

// Quiz types
export type {
    QuizQuestionKind,
    QuizQuestion,
    QuizAnswerResult,
    QuizSessionState,
    RandomSource,
} from "./quiz.types";

// Report types
export type { StudyReport } from "./report.types";

// Event types
export type {
    DeckEventType,
    DeckEvent,
    DeckEventOf,
    DeckEventListener,
    AnyDeckEvent,
    CardAddedEvent,
    CardUpdatedEvent,
    CardRemovedEvent,
    CardReviewedEvent,
    BulkChangeEvent,
    CategoriesChangedEvent,
    QuizScoreChangedEvent,
    StoreLoadedEvent,
    StoreSavedEvent,
    StoreSaveFailedEvent,
} from "./events.types";
