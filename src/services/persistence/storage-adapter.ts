/**
 * Storage Adapter
 * Minimal file system surface used by the persistence services,
 * so tests can swap the disk for an in-memory implementation
 */
import { copyFile, mkdir, readFile, readdir, rename, rm, stat, writeFile } from "node:fs/promises";
import path from "node:path";

export interface StorageStat {
	size: number;
	/** Modification time in ms since epoch */
	mtime: number;
}

export interface StorageAdapter {
	exists(filePath: string): Promise<boolean>;
	read(filePath: string): Promise<string>;
	write(filePath: string, data: string): Promise<void>;
	/** Replaces the destination if it exists */
	rename(from: string, to: string): Promise<void>;
	copy(from: string, to: string): Promise<void>;
	remove(filePath: string): Promise<void>;
	/** Creates the folder and any missing parents */
	mkdir(folderPath: string): Promise<void>;
	/** Files directly inside a folder, as full paths */
	list(folderPath: string): Promise<{ files: string[] }>;
	stat(filePath: string): Promise<StorageStat | null>;
}

/**
 * StorageAdapter backed by node:fs
 */
export class NodeStorageAdapter implements StorageAdapter {
	async exists(filePath: string): Promise<boolean> {
		return (await this.stat(filePath)) !== null;
	}

	async read(filePath: string): Promise<string> {
		return readFile(filePath, "utf8");
	}

	async write(filePath: string, data: string): Promise<void> {
		await writeFile(filePath, data, "utf8");
	}

	async rename(from: string, to: string): Promise<void> {
		await rename(from, to);
	}

	async copy(from: string, to: string): Promise<void> {
		await copyFile(from, to);
	}

	async remove(filePath: string): Promise<void> {
		await rm(filePath, { force: true });
	}

	async mkdir(folderPath: string): Promise<void> {
		await mkdir(folderPath, { recursive: true });
	}

	async list(folderPath: string): Promise<{ files: string[] }> {
		const entries = await readdir(folderPath, { withFileTypes: true });
		return {
			files: entries
				.filter((entry) => entry.isFile())
				.map((entry) => path.join(folderPath, entry.name)),
		};
	}

	async stat(filePath: string): Promise<StorageStat | null> {
		try {
			const info = await stat(filePath);
			return { size: info.size, mtime: info.mtimeMs };
		} catch (error) {
			if (isNotFound(error)) {
				return null;
			}
			throw error;
		}
	}
}

function isNotFound(error: unknown): boolean {
	return error instanceof Error && "code" in error && error.code === "ENOENT";
}
