/**
 * AuditJournal — optional sink for the staging audit log.
 *
 * The ledger keeps each order's own audit trail. A journal receives the
 * same history as one flat stream for reporting and replay. Records use
 * plain strings and numbers so they survive a JSON round trip.
 */

import { z } from "../lib/validation/index.js";

export interface AuditJournal {
	record(entry: AuditRecord): Promise<void>;
	flush(): Promise<void>;
}

const auditRecordSchema = z.discriminatedUnion("type", [
	z.object({
		type: z.literal("strategy_staged"),
		strategyId: z.string(),
		candidateId: z.string(),
		symbol: z.string(),
		archetype: z.string(),
		orderIds: z.array(z.string()),
		riskScore: z.number(),
		actor: z.string(),
		timestamp: z.number(),
	}),
	z.object({
		type: z.literal("strategy_refused"),
		candidateId: z.string(),
		symbol: z.string(),
		stage: z.enum(["structure", "risk"]),
		reasons: z.array(z.string()),
		actor: z.string(),
		timestamp: z.number(),
	}),
	z.object({
		type: z.literal("order_transition"),
		orderId: z.string(),
		strategyId: z.string(),
		from: z.string(),
		to: z.string(),
		event: z.string(),
		actor: z.string(),
		note: z.string(),
		timestamp: z.number(),
	}),
	z.object({
		type: z.literal("strategy_archived"),
		strategyId: z.string(),
		aggregateStatus: z.string(),
		timestamp: z.number(),
	}),
	z.object({
		type: z.literal("trade_result"),
		tradeDate: z.string(),
		pnl: z.string(),
		dailyLoss: z.string(),
		timestamp: z.number(),
	}),
]);

/** One line of the audit stream. */
export type AuditRecord = z.infer<typeof auditRecordSchema>;

/** Parses a decoded JSON value back into an AuditRecord, or null if it is not one. */
export function parseAuditRecord(value: unknown): AuditRecord | null {
	const parsed = auditRecordSchema.safeParse(value);
	return parsed.success ? parsed.data : null;
}
