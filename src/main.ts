/**
 * Deck Engine
 * Builds every service from settings and owns startup and shutdown
 */
import type { DeckSettings, RandomSource, StudyReport } from "./types";
import { getDataFilePath, resolveSettings } from "./settings";
import { EventBusService } from "./services/core/event-bus.service";
import { CardFileStore } from "./services/persistence/card-file-store.service";
import { BackupService } from "./services/persistence/backup.service";
import { NodeStorageAdapter, type StorageAdapter } from "./services/persistence/storage-adapter";
import { DeckStore } from "./services/deck/deck-store.service";
import { QuizSessionService } from "./services/quiz/quiz-session.service";
import { CardTransferService } from "./services/transfer/card-transfer.service";
import { generateStudyReport } from "./services/stats/study-report.service";
import { QuizStateManager } from "./state/quiz.state";

export interface DeckEngineOptions {
	/** Merged over DEFAULT_SETTINGS */
	settings?: Partial<DeckSettings>;
	/** Defaults to the local file system */
	adapter?: StorageAdapter;
	now?: () => Date;
	random?: RandomSource;
	createId?: () => string;
}

export class DeckEngine {
	readonly settings: DeckSettings;
	readonly events: EventBusService;
	readonly fileStore: CardFileStore;
	readonly deck: DeckStore;
	readonly quiz: QuizSessionService;
	readonly transfer: CardTransferService;
	readonly backups: BackupService;

	private now: () => Date;
	private disposed = false;

	/**
	 * @throws ConfigurationError if the settings are invalid
	 */
	constructor(options: DeckEngineOptions = {}) {
		this.settings = resolveSettings(options.settings);
		this.now = options.now ?? (() => new Date());

		const adapter = options.adapter ?? new NodeStorageAdapter();
		const filePath = getDataFilePath(this.settings);

		this.events = new EventBusService();
		this.fileStore = new CardFileStore(adapter, filePath, {
			debounceMs: this.settings.saveDebounceMs,
			onSaved: (cardCount) =>
				this.events.emit({
					type: "store:saved",
					filePath,
					cardCount,
					timestamp: this.now().getTime(),
				}),
			onSaveError: (error) =>
				this.events.emit({
					type: "store:save-failed",
					filePath,
					error: error.message,
					timestamp: this.now().getTime(),
				}),
		});

		this.deck = new DeckStore({
			fileStore: this.fileStore,
			events: this.events,
			baselineCategory: this.settings.baselineCategory,
			now: this.now,
			random: options.random,
			createId: options.createId,
		});

		this.quiz = new QuizSessionService(this.deck, new QuizStateManager(), {
			quizSize: this.settings.quizSize,
			random: options.random,
		});
		this.transfer = new CardTransferService(adapter, this.deck);
		this.backups = new BackupService(adapter, this.deck, {
			filePath,
			maxBackups: this.settings.maxBackups,
			now: this.now,
		});
	}

	/**
	 * Build an engine and load the card file (or the seed set)
	 */
	static async create(options: DeckEngineOptions = {}): Promise<DeckEngine> {
		const engine = new DeckEngine(options);
		await engine.deck.initialize();
		console.log(
			`[HanziDeck] Loaded ${engine.deck.size} cards from ${engine.fileStore.getFilePath()}`
		);
		return engine;
	}

	getStudyReport(): StudyReport {
		return generateStudyReport(this.deck, this.now());
	}

	/**
	 * Save pending changes and release listeners
	 */
	async dispose(): Promise<void> {
		if (this.disposed) {
			return;
		}
		this.disposed = true;

		await this.deck.dispose();
		this.quiz.getState().clearListeners();
		this.events.clear();
	}
}
