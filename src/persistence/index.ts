export type { AuditJournal, AuditRecord } from "./journal.js";
export { parseAuditRecord } from "./journal.js";
export { FileAuditJournal } from "./file-journal.js";
export type { CorruptLine, FileAuditJournalConfig, RestoreResult } from "./file-journal.js";
export { MemoryAuditJournal } from "./memory-journal.js";
export type { MemoryAuditJournalConfig } from "./memory-journal.js";
