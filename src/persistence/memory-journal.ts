/**
 * MemoryAuditJournal — in-memory, append-only audit sink.
 *
 * For tests and short-lived processes. Not persisted across restarts.
 */

import type { AuditJournal, AuditRecord } from "./journal.js";

export interface MemoryAuditJournalConfig {
	/** Oldest records are dropped beyond this count */
	readonly maxEntries?: number | undefined;
}

export class MemoryAuditJournal implements AuditJournal {
	private readonly store: AuditRecord[] = [];
	private readonly maxEntries: number;

	constructor(config?: MemoryAuditJournalConfig) {
		this.maxEntries = config?.maxEntries ?? Number.POSITIVE_INFINITY;
	}

	async record(entry: AuditRecord): Promise<void> {
		this.store.push(entry);
		const excess = this.store.length - this.maxEntries;
		if (excess > 0) {
			this.store.splice(0, excess);
		}
	}

	/** Returns a shallow copy of all recorded entries. */
	entries(): AuditRecord[] {
		return [...this.store];
	}

	/** Entries of one type, narrowed. */
	entriesOfType<T extends AuditRecord["type"]>(type: T): Extract<AuditRecord, { type: T }>[] {
		return this.store.filter((e): e is Extract<AuditRecord, { type: T }> => e.type === type);
	}

	clear(): void {
		this.store.length = 0;
	}

	async flush(): Promise<void> {}

	get size(): number {
		return this.store.length;
	}
}
