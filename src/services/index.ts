/**
 * Central export for services
 */

// Core
export { EventBusService } from "./core/event-bus.service";
export {
	gradeReview,
	applyReviewGrade,
	reviewIntervalDays,
	type ReviewGrade,
} from "./core/review-scheduler.service";

// Persistence
export {
	NodeStorageAdapter,
	type StorageAdapter,
	type StorageStat,
} from "./persistence/storage-adapter";
export {
	CardFileStore,
	type CardFileStoreOptions,
	type CardLoadResult,
	type CardSnapshot,
} from "./persistence/card-file-store.service";
export { serializeCards, toCardRecord, type CardRecord } from "./persistence/card-serializer";
export {
	BackupService,
	formatBackupTimestamp,
	parseBackupFilename,
	formatFileSize,
	type BackupInfo,
	type BackupServiceOptions,
} from "./persistence/backup.service";

// Deck
export { DeckStore, computeCategories, type DeckStoreOptions } from "./deck/deck-store.service";
export { DeckViewCache } from "./deck/deck-view-cache";
export { createCard, generateCardId, resetLearningState } from "./deck/card-factory";
export { buildSeedCards } from "./deck/seed-cards";

// Quiz
export {
	selectQuizCards,
	questionKindFor,
	expectedAnswer,
	buildOptions,
	buildQuestion,
	isCorrectAnswer,
} from "./quiz/quiz-builder";
export { QuizSessionService, type QuizSessionOptions } from "./quiz/quiz-session.service";

// Transfer
export {
	CardTransferService,
	CSV_HEADER,
	exportCardsToJSON,
	importCardsFromJSON,
	safeImportCardsFromJSON,
	exportCardsToCSV,
	escapeCsvField,
	type ExportFormat,
} from "./transfer/card-transfer.service";

// Stats
export { generateStudyReport } from "./stats/study-report.service";
