/**
 * Backup Service
 * Timestamped copies of the card file, restore and pruning
 *
 * Backups sit next to the card file:
 *   <dataFolder>/flashcards_backup_YYYY-MM-DD-HHmmss-SSS.json (UTC)
 */
import path from "node:path";
import { BACKUP_PREFIX } from "../../constants";
import { FileError } from "../../errors";
import { parseCardsJson } from "../../validation";
import { asFileError, getErrorMessage } from "../../utils/error.utils";
import type { DeckStore } from "../deck/deck-store.service";
import type { StorageAdapter } from "./storage-adapter";

const BACKUP_PATTERN = new RegExp(
	`^${BACKUP_PREFIX}(\\d{4})-(\\d{2})-(\\d{2})-(\\d{2})(\\d{2})(\\d{2})-(\\d{3})\\.json$`
);

/**
 * Backup file information
 */
export interface BackupInfo {
	/** Full path to the backup file */
	path: string;
	filename: string;
	timestamp: Date;
	sizeBytes: number;
	/** YYYY-MM-DD HH:mm:ss (UTC) */
	formattedDate: string;
	/** e.g. "1.5 KB" */
	formattedSize: string;
}

export interface BackupServiceOptions {
	/** Card file being backed up */
	filePath: string;
	/** Backups kept after each new one (0 = keep all) */
	maxBackups: number;
	now?: () => Date;
}

function pad(value: number, length = 2): string {
	return String(value).padStart(length, "0");
}

/**
 * Filename timestamp: YYYY-MM-DD-HHmmss-SSS (UTC)
 */
export function formatBackupTimestamp(date: Date): string {
	return (
		`${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}` +
		`-${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}` +
		`-${pad(date.getUTCMilliseconds(), 3)}`
	);
}

/**
 * Timestamp of a backup filename, or null for any other file
 */
export function parseBackupFilename(filename: string): Date | null {
	const match = filename.match(BACKUP_PATTERN);
	if (!match) return null;

	const [, year, month, day, hours, minutes, seconds, millis] = match;
	if (!year || !month || !day || !hours || !minutes || !seconds || !millis) return null;

	return new Date(
		Date.UTC(
			parseInt(year),
			parseInt(month) - 1,
			parseInt(day),
			parseInt(hours),
			parseInt(minutes),
			parseInt(seconds),
			parseInt(millis)
		)
	);
}

export function formatFileSize(bytes: number): string {
	if (bytes < 1024) return `${bytes} B`;
	if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
	return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

function formatDateDisplay(date: Date): string {
	return (
		`${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
		`${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
	);
}

export class BackupService {
	private adapter: StorageAdapter;
	private deck: DeckStore;
	private filePath: string;
	private maxBackups: number;
	private now: () => Date;

	constructor(adapter: StorageAdapter, deck: DeckStore, options: BackupServiceOptions) {
		this.adapter = adapter;
		this.deck = deck;
		this.filePath = options.filePath;
		this.maxBackups = options.maxBackups;
		this.now = options.now ?? (() => new Date());
	}

	private getBackupFolder(): string {
		return path.dirname(this.filePath);
	}

	/**
	 * Copy the card file to a new timestamped backup
	 * Pending changes are saved first; old backups beyond maxBackups are pruned
	 *
	 * @returns Path to the created backup file
	 * @throws FileError if saving or copying fails
	 */
	async createBackup(): Promise<string> {
		await this.deck.flush();

		if (!(await this.adapter.exists(this.filePath))) {
			throw new FileError("Card file does not exist yet", this.filePath, "read");
		}

		const filename = `${BACKUP_PREFIX}${formatBackupTimestamp(this.now())}.json`;
		const backupPath = path.join(this.getBackupFolder(), filename);

		try {
			await this.adapter.copy(this.filePath, backupPath);
		} catch (error) {
			throw asFileError(error, backupPath, "copy");
		}
		console.log(`[HanziDeck] Backup created at: ${backupPath}`);

		if (this.maxBackups > 0) {
			await this.pruneBackups(this.maxBackups);
		}
		return backupPath;
	}

	/**
	 * List all backups, newest first
	 */
	async listBackups(): Promise<BackupInfo[]> {
		const backups: BackupInfo[] = [];
		const folder = this.getBackupFolder();

		try {
			if (!(await this.adapter.exists(folder))) {
				return [];
			}

			const { files } = await this.adapter.list(folder);
			for (const filePath of files) {
				const filename = path.basename(filePath);
				const timestamp = parseBackupFilename(filename);
				if (!timestamp) continue;

				const stat = await this.adapter.stat(filePath);
				if (!stat) continue;

				backups.push({
					path: filePath,
					filename,
					timestamp,
					sizeBytes: stat.size,
					formattedDate: formatDateDisplay(timestamp),
					formattedSize: formatFileSize(stat.size),
				});
			}

			backups.sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime());
		} catch (error) {
			console.warn("[HanziDeck] Failed to list backups:", error);
		}

		return backups;
	}

	/**
	 * Replace the card file with a backup and reload the deck
	 * The backup must decode as a card collection; a safety backup of the
	 * current file is taken before it is overwritten
	 *
	 * @returns true if restoration succeeded
	 */
	async restoreFromBackup(backupPath: string): Promise<boolean> {
		try {
			const content = await this.adapter.read(backupPath);
			parseCardsJson(content);

			const safetyBackupPath = await this.createBackup();
			console.log(`[HanziDeck] Safety backup created at: ${safetyBackupPath}`);

			const tempPath = `${this.filePath}.tmp`;
			await this.adapter.write(tempPath, content);
			await this.adapter.rename(tempPath, this.filePath);

			await this.deck.reload();
			console.log(`[HanziDeck] Restored ${this.deck.size} cards from ${backupPath}`);
			return true;
		} catch (error) {
			console.error("[HanziDeck] Failed to restore backup:", getErrorMessage(error));
			return false;
		}
	}

	/**
	 * Delete old backups keeping only the newest ones
	 * @param keepCount Number of backups to keep (0 = keep all)
	 * @returns Number of backups deleted
	 */
	async pruneBackups(keepCount: number): Promise<number> {
		if (keepCount <= 0) return 0;

		const backups = await this.listBackups();
		if (backups.length <= keepCount) return 0;

		let deleted = 0;
		for (const backup of backups.slice(keepCount)) {
			try {
				await this.adapter.remove(backup.path);
				deleted++;
			} catch (error) {
				console.warn(`[HanziDeck] Failed to delete backup ${backup.path}:`, error);
			}
		}

		return deleted;
	}

	/**
	 * @returns true if deletion succeeded
	 */
	async deleteBackup(backupPath: string): Promise<boolean> {
		if (!parseBackupFilename(path.basename(backupPath))) {
			console.warn(`[HanziDeck] Not a backup file: ${backupPath}`);
			return false;
		}
		try {
			await this.adapter.remove(backupPath);
			return true;
		} catch (error) {
			console.warn(`[HanziDeck] Failed to delete backup ${backupPath}:`, error);
			return false;
		}
	}
}
