/**
 * Domain primitive identifiers — branded types for compile-time safety.
 *
 * Each identifier wraps a string with a unique brand, preventing accidental
 * mixing (e.g., passing an OrderId where a StrategyId is expected).
 */

import { randomUUID } from "node:crypto";

// ── Brand infrastructure ─────────────────────────────────────────────

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

// ── Identifier types ─────────────────────────────────────────────────

/** Identifier of a staged strategy (one per accepted candidate). */
export type StrategyId = Brand<string, "StrategyId">;
/** Identifier of one staged order (one per candidate leg). */
export type OrderId = Brand<string, "OrderId">;
/** Reference assigned by the broker collaborator once an order is transmitted. */
export type BrokerRef = Brand<string, "BrokerRef">;

// ── Factory functions with validation ────────────────────────────────

function createBrandedId<B extends string>(value: string, label: B): Brand<string, B> {
	const trimmed = value.trim();
	if (trimmed.length === 0) {
		throw new Error(`${label} cannot be empty`);
	}
	return trimmed as Brand<string, B>;
}

/** Create a validated StrategyId from a raw string. Throws if empty. */
export function strategyId(value: string): StrategyId {
	return createBrandedId(value, "StrategyId");
}

/** Create a validated OrderId from a raw string. Throws if empty. */
export function orderId(value: string): OrderId {
	return createBrandedId(value, "OrderId");
}

/** Create a validated BrokerRef from a raw string. Throws if empty. */
export function brokerRef(value: string): BrokerRef {
	return createBrandedId(value, "BrokerRef");
}

/** Extract the raw string from any branded identifier type. */
export function idToString(id: StrategyId | OrderId | BrokerRef): string {
	return id as string;
}

// ── Id generation ────────────────────────────────────────────────────

/** Injectable id generator so tests can predict the ids the controller assigns. */
export interface IdSource {
	nextStrategyId(): StrategyId;
	nextOrderId(): OrderId;
}

/** Production id source: random UUIDs with a readable prefix. */
export const RandomIdSource: IdSource = {
	nextStrategyId: () => strategyId(`STRAT_${randomUUID()}`),
	nextOrderId: () => orderId(`ORD_${randomUUID()}`),
};

/** Deterministic id source for tests: STRAT-1, STRAT-2, … and ORD-1, ORD-2, … */
export class SequentialIdSource implements IdSource {
	private strategies = 0;
	private orders = 0;

	nextStrategyId(): StrategyId {
		this.strategies++;
		return strategyId(`STRAT-${this.strategies}`);
	}

	nextOrderId(): OrderId {
		this.orders++;
		return orderId(`ORD-${this.orders}`);
	}
}
