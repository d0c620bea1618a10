/**
 * FileAuditJournal -- JSONL audit sink.
 *
 * Appends one JSON object per line. Writes are queued so lines never
 * interleave, and the file can be rotated by size. restore() reads the
 * records back and reports unreadable lines instead of dropping them.
 */

import { appendFile, readFile, rename, stat } from "node:fs/promises";
import type { AuditJournal, AuditRecord } from "./journal.js";
import { parseAuditRecord } from "./journal.js";

export interface FileAuditJournalConfig {
	readonly filePath: string;
	/** Rotate before a write once the file reaches this size */
	readonly maxFileSizeBytes?: number | undefined;
	/** Rotated files kept as `<path>.1` .. `<path>.N`; defaults to 5 when rotating */
	readonly maxFiles?: number | undefined;
}

/** A line that is not JSON, or is JSON but not an audit record. */
export interface CorruptLine {
	readonly lineNumber: number;
	readonly raw: string;
	readonly reason: "invalid_json" | "unknown_record";
}

export interface RestoreResult {
	readonly entries: readonly AuditRecord[];
	readonly corruptLines: readonly CorruptLine[];
}

const MAX_KEPT_WRITE_ERRORS = 10;
const CORRUPT_PREVIEW_CHARS = 200;

export class FileAuditJournal implements AuditJournal {
	private readonly config: FileAuditJournalConfig;
	private closed = false;
	private writeQueue: Promise<void> = Promise.resolve();
	private readonly recentWriteErrors: Error[] = [];

	private constructor(config: FileAuditJournalConfig) {
		this.config = config;
	}

	static create(config: FileAuditJournalConfig): FileAuditJournal {
		return new FileAuditJournal(config);
	}

	private get filePath(): string {
		return this.config.filePath;
	}

	private get maxFiles(): number {
		if (this.config.maxFiles !== undefined) return this.config.maxFiles;
		return this.config.maxFileSizeBytes !== undefined ? 5 : 0;
	}

	/**
	 * Queues one record and resolves once it is on disk.
	 * @throws Error if the journal is closed or the append fails
	 */
	async record(entry: AuditRecord): Promise<void> {
		if (this.closed) {
			throw new Error("FileAuditJournal is closed");
		}
		const line = `${JSON.stringify(entry)}\n`;
		// A failed write was already reported to its own caller; later writes still run.
		const next = this.writeQueue.catch(() => undefined).then(() => this.writeOnce(line));
		this.writeQueue = next;
		await next;
	}

	async restore(): Promise<RestoreResult> {
		let content: string;
		try {
			content = await readFile(this.filePath, "utf-8");
		} catch (error: unknown) {
			if (isNodeError(error) && error.code === "ENOENT") {
				return { entries: [], corruptLines: [] };
			}
			throw error;
		}

		const entries: AuditRecord[] = [];
		const corruptLines: CorruptLine[] = [];
		const lines = content.split("\n");

		for (let i = 0; i < lines.length; i++) {
			const trimmed = lines[i]?.trim() ?? "";
			if (trimmed.length === 0) continue;

			const raw = trimmed.slice(0, CORRUPT_PREVIEW_CHARS);
			let decoded: unknown;
			try {
				decoded = JSON.parse(trimmed);
			} catch {
				corruptLines.push({ lineNumber: i + 1, raw, reason: "invalid_json" });
				continue;
			}
			const record = parseAuditRecord(decoded);
			if (record === null) {
				corruptLines.push({ lineNumber: i + 1, raw, reason: "unknown_record" });
			} else {
				entries.push(record);
			}
		}

		return { entries, corruptLines };
	}

	/** Refuses new records and waits for queued ones. */
	async close(): Promise<void> {
		this.closed = true;
		await this.flush();
	}

	/** Waits for queued writes; their failures were reported to their callers. */
	async flush(): Promise<void> {
		await this.writeQueue.catch(() => undefined);
	}

	/** The most recent write failures, oldest first. */
	writeErrors(): readonly Error[] {
		return [...this.recentWriteErrors];
	}

	private async writeOnce(line: string): Promise<void> {
		try {
			if (this.config.maxFileSizeBytes !== undefined && this.config.maxFileSizeBytes > 0) {
				await this.rotateIfNeeded(this.config.maxFileSizeBytes);
			}
			await appendFile(this.filePath, line, "utf-8");
		} catch (error: unknown) {
			const code = isNodeError(error) ? error.code : "UNKNOWN";
			const detail = error instanceof Error ? error.message : String(error);
			const failure = new Error(
				`FileAuditJournal write to ${this.filePath} failed: [${code}] ${detail}`,
				{ cause: error },
			);
			this.recentWriteErrors.push(failure);
			if (this.recentWriteErrors.length > MAX_KEPT_WRITE_ERRORS) {
				this.recentWriteErrors.shift();
			}
			throw failure;
		}
	}

	private async rotateIfNeeded(maxSize: number): Promise<void> {
		try {
			const stats = await stat(this.filePath);
			if (stats.size < maxSize) return;
		} catch (error: unknown) {
			if (isNodeError(error) && error.code === "ENOENT") return;
			throw error;
		}
		await this.rotate();
	}

	private async rotate(): Promise<void> {
		for (let i = this.maxFiles - 1; i >= 1; i--) {
			await renameIfExists(`${this.filePath}.${i}`, `${this.filePath}.${i + 1}`);
		}
		await renameIfExists(this.filePath, `${this.filePath}.1`);
	}
}

async function renameIfExists(src: string, dst: string): Promise<void> {
	try {
		await rename(src, dst);
	} catch (error: unknown) {
		if (!isNodeError(error) || error.code !== "ENOENT") throw error;
	}
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && "code" in error;
}
