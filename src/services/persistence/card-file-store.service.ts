/**
 * Card File Store Service
 * Persists the whole card collection as one JSON file
 *
 * - Read once at startup
 * - Debounced writes: mutations inside the debounce window coalesce into one write
 * - Writes are chained, never interleaved, and serialize the latest state when they run
 * - Atomic: data goes to a temp file which is then renamed over the card file
 */
import path from "node:path";
import type { Card } from "../../types";
import { ValidationError, type AppError, type FileError } from "../../errors";
import { dedupeCardsById, parseCardsJson } from "../../validation";
import { asFileError } from "../../utils/error.utils";
import { serializeCards } from "./card-serializer";
import type { StorageAdapter } from "./storage-adapter";

/**
 * Outcome of reading the card file
 */
export type CardLoadResult =
	| { status: "loaded"; cards: Card[]; duplicateIds: string[] }
	| { status: "missing" }
	| { status: "corrupt"; error: AppError };

/**
 * Supplies the cards to write at the moment the write runs
 */
export type CardSnapshot = () => readonly Card[];

export interface CardFileStoreOptions {
	/** Delay before a scheduled save is written */
	debounceMs: number;
	/** Called after every successful write */
	onSaved?: (cardCount: number) => void;
	/** Called when a scheduled (automatic) save fails */
	onSaveError?: (error: FileError) => void;
}

export class CardFileStore {
	private adapter: StorageAdapter;
	private filePath: string;
	private options: CardFileStoreOptions;
	private saveTimer: ReturnType<typeof setTimeout> | null = null;
	private pendingSnapshot: CardSnapshot | null = null;
	private writeChain: Promise<void> = Promise.resolve();
	private writeCount = 0;

	constructor(adapter: StorageAdapter, filePath: string, options: CardFileStoreOptions) {
		this.adapter = adapter;
		this.filePath = filePath;
		this.options = options;
	}

	getFilePath(): string {
		return this.filePath;
	}

	/**
	 * Number of completed writes (for diagnostics and tests)
	 */
	getWriteCount(): number {
		return this.writeCount;
	}

	hasPendingSave(): boolean {
		return this.pendingSnapshot !== null;
	}

	/**
	 * Read and decode the card file
	 * Never throws: read and decode failures are reported as "corrupt"
	 */
	async load(): Promise<CardLoadResult> {
		let content: string;
		try {
			if (!(await this.adapter.exists(this.filePath))) {
				return { status: "missing" };
			}
			content = await this.adapter.read(this.filePath);
		} catch (error) {
			return {
				status: "corrupt",
				error: asFileError(error, this.filePath, "read"),
			};
		}

		try {
			const { cards, duplicateIds } = dedupeCardsById(parseCardsJson(content));
			return { status: "loaded", cards, duplicateIds };
		} catch (error) {
			if (error instanceof ValidationError) {
				return { status: "corrupt", error };
			}
			throw error;
		}
	}

	/**
	 * Schedule a debounced save
	 * A save scheduled before the timer fires replaces the earlier one
	 */
	scheduleSave(snapshot: CardSnapshot): void {
		this.pendingSnapshot = snapshot;
		this.cancelTimer();

		this.saveTimer = setTimeout(() => {
			this.saveTimer = null;
			void this.runScheduledSave();
		}, this.options.debounceMs);
	}

	/**
	 * Write the pending save immediately
	 *
	 * @throws FileError if the write fails
	 */
	async flush(): Promise<void> {
		this.cancelTimer();
		const snapshot = this.pendingSnapshot;
		this.pendingSnapshot = null;

		if (!snapshot) {
			await this.writeChain;
			return;
		}
		await this.enqueueWrite(snapshot);
	}

	/**
	 * Write the given cards now, after any write already in flight
	 *
	 * @throws FileError if the write fails
	 */
	async saveNow(cards: readonly Card[]): Promise<void> {
		this.discardPending();
		await this.enqueueWrite(() => cards);
	}

	/**
	 * Resolves once every queued write has settled
	 */
	whenIdle(): Promise<void> {
		return this.writeChain;
	}

	/**
	 * Drop a scheduled save without writing it
	 */
	discardPending(): void {
		this.cancelTimer();
		this.pendingSnapshot = null;
	}

	/**
	 * Stop the timer; a pending save is dropped
	 * Call flush() first to keep it
	 */
	dispose(): void {
		this.discardPending();
	}

	private cancelTimer(): void {
		if (this.saveTimer) {
			clearTimeout(this.saveTimer);
			this.saveTimer = null;
		}
	}

	/**
	 * Timer callback; failures are reported, never thrown
	 */
	private async runScheduledSave(): Promise<void> {
		const snapshot = this.pendingSnapshot;
		this.pendingSnapshot = null;
		if (!snapshot) {
			return;
		}

		try {
			await this.enqueueWrite(snapshot);
		} catch (error) {
			const fileError = asFileError(error, this.filePath, "write");
			console.error(`[HanziDeck] Autosave failed for ${this.filePath}:`, fileError.message);
			this.options.onSaveError?.(fileError);
		}
	}

	private enqueueWrite(snapshot: CardSnapshot): Promise<void> {
		const run = this.writeChain.then(() => this.writeAtomically(snapshot()));
		// Keep the chain alive after a failed write; the caller still sees the rejection
		this.writeChain = run.catch(() => undefined);
		return run;
	}

	private async writeAtomically(cards: readonly Card[]): Promise<void> {
		const tempPath = `${this.filePath}.tmp`;
		try {
			await this.adapter.mkdir(path.dirname(this.filePath));
			await this.adapter.write(tempPath, serializeCards(cards));
			await this.adapter.rename(tempPath, this.filePath);
		} catch (error) {
			throw asFileError(error, this.filePath, "write");
		}

		this.writeCount++;
		this.options.onSaved?.(cards.length);
	}
}
