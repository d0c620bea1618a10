/**
 * Stage Iron Condor — stages a candidate, approves it, then walks each leg
 * through submission and fill against an in-memory ledger.
 *
 * Run: npx tsx examples/stage-iron-condor.ts
 */

import {
	Decimal,
	LifecycleController,
	MemoryAuditJournal,
	brokerRef,
	parsePortfolioSnapshot,
	parseStrategyCandidate,
	resolveConfig,
	unwrap,
} from "../src/index.js";

const config = resolveConfig({
	limits: { maxPositionSize: 5000, maxPortfolioExposure: 20_000, maxLossPerDay: 2000 },
});
const journal = new MemoryAuditJournal();
const controller = LifecycleController.fromConfig(config, { journal });

controller.events.on("strategy_staged", (e) => {
	console.log(`staged ${e.strategyId} (${e.symbol}) score=${e.riskScore.toFixed(2)}`);
});
controller.events.on("order_filled", (e) => {
	console.log(`  ${e.orderId} ${e.status} ${e.filledQuantity} @ ${e.filledPrice.toString()}`);
});
controller.events.on("strategy_archived", (e) => {
	console.log(`archived ${e.strategyId} as ${e.aggregateStatus}`);
});

// ── Collaborator payloads ────────────────────────────────────────────

const candidate = unwrap(
	parseStrategyCandidate({
		id: "scan-0001",
		symbol: "SPY",
		archetype: "iron_condor",
		legs: [
			{ side: "sell", instrument: "put", strike: 440, quantity: 1 },
			{ side: "buy", instrument: "put", strike: 435, quantity: 1 },
			{ side: "sell", instrument: "call", strike: 460, quantity: 1 },
			{ side: "buy", instrument: "call", strike: 465, quantity: 1 },
		],
		declaredMaxRisk: 290,
		declaredMaxProfit: 210,
	}),
);

const portfolio = unwrap(parsePortfolioSnapshot({ equity: 100_000, cash: 40_000 }));

// ── Lifecycle ───────────────────────────────────────────────────────

const staged = await controller.stageStrategy(candidate, portfolio);
if (!staged.ok) {
	console.error(`not staged: ${staged.error.message}`);
	process.exit(1);
}
const id = staged.value;

unwrap(await controller.approveStrategy(id, { actor: "example" }));

const snapshot = unwrap(await controller.getStrategy(id));
const prices = ["2.10", "1.05", "1.95", "0.90"];
for (const [i, order] of snapshot.orders.entries()) {
	unwrap(await controller.markSubmitted(order.id, brokerRef(`BRK-${i + 1}`)));
	unwrap(await controller.markFilled(order.id, Decimal.from(prices[i] ?? "1"), 1));
}

console.log(`journal holds ${journal.size} records`);
