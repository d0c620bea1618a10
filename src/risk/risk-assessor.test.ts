import { describe, expect, it } from "vitest";
import {
	SCENARIO_LIMITS,
	candidate,
	emptyPortfolio,
	ironCondor,
	leg,
	position,
} from "../__tests__/fixtures.js";
import { PositionKind } from "../candidate/types.js";
import { Decimal } from "../shared/decimal.js";
import { RiskAssessor, RiskWarning, assess, portfolioExposureOf } from "./risk-assessor.js";

function setup(limits = SCENARIO_LIMITS) {
	return { assessor: RiskAssessor.create(limits), portfolio: emptyPortfolio() };
}

describe("RiskAssessor", () => {
	describe("iron condor within limits", () => {
		it("approves with a low score and no warnings", () => {
			const { assessor, portfolio } = setup();
			const a = assessor.assess(ironCondor(), portfolio, Decimal.zero());
			expect(a.approved).toBe(true);
			expect(a.violations).toEqual([]);
			expect(a.warnings).toEqual([]);
			// 40*290/5000 + 30*290/20000 + 30*290/2000
			expect(a.riskScore).toBeCloseTo(7.105, 10);
			expect(a.maxLoss.toNumber()).toBe(290);
			expect(a.positionExposure.toNumber()).toBe(290);
			expect(a.portfolioExposure.toNumber()).toBe(290);
		});
	});

	describe("violations", () => {
		it("rejects a trade over the per-trade loss limit", () => {
			const { assessor, portfolio } = setup();
			const a = assessor.assess(
				ironCondor({ declaredMaxRisk: Decimal.from(1500) }),
				portfolio,
				Decimal.zero(),
			);
			expect(a.approved).toBe(false);
			expect(a.violations).toEqual(["Max loss 1500 exceeds per-trade limit 1000"]);
			// 12 + 2.25 + 22.5
			expect(a.riskScore).toBeCloseTo(36.75, 10);
		});

		it("reports every breached limit independently", () => {
			const { assessor, portfolio } = setup();
			const a = assessor.assess(
				ironCondor({ declaredMaxRisk: Decimal.from(6000) }),
				portfolio,
				Decimal.zero(),
			);
			expect(a.violations).toEqual([
				"Position size 6000 exceeds limit 5000",
				"Max loss 6000 exceeds per-trade limit 1000",
				"Potential daily loss 6000 exceeds limit 2000",
			]);
		});

		it("adds the loss already booked today", () => {
			const { assessor, portfolio } = setup({ ...SCENARIO_LIMITS, maxLossPerTrade: 5000 });
			const a = assessor.assess(
				ironCondor({ declaredMaxRisk: Decimal.from(1500) }),
				portfolio,
				Decimal.from(600),
			);
			expect(a.violations).toEqual(["Potential daily loss 2100 exceeds limit 2000"]);
			// 12 + 2.25 + min(30, 31.5)
			expect(a.riskScore).toBeCloseTo(44.25, 10);
		});

		it("counts open positions times the contract multiplier in portfolio exposure", () => {
			const portfolio = emptyPortfolio({ positions: [position("QQQ", -50, 4)] });
			const a = assess(ironCondor(), portfolio, Decimal.zero(), SCENARIO_LIMITS);
			expect(a.portfolioExposure.toNumber()).toBe(20_290);
			expect(a.violations).toEqual(["Portfolio exposure 20290 exceeds limit 20000"]);
		});

		it("treats a zero limit as always breached and scores it as nothing", () => {
			const { assessor, portfolio } = setup({ ...SCENARIO_LIMITS, maxPositionSize: 0 });
			const a = assessor.assess(ironCondor(), portfolio, Decimal.zero());
			expect(a.approved).toBe(false);
			expect(a.violations).toEqual(["Position size 290 exceeds limit 0"]);
			expect(a.riskScore).toBeCloseTo(4.785, 10);
		});

		it("treats a negative limit as always breached", () => {
			const { assessor, portfolio } = setup({ ...SCENARIO_LIMITS, maxLossPerDay: -1 });
			const a = assessor.assess(ironCondor(), portfolio, Decimal.zero());
			expect(a.violations).toEqual(["Potential daily loss 290 exceeds limit -1"]);
		});
	});

	describe("covered calls", () => {
		const shortCall = candidate("covered_call", [leg("sell", "call", 470, 2)]);

		it("requires 100 shares per contract", () => {
			const portfolio = emptyPortfolio({ positions: [position("SPY", 150, 0)] });
			const a = assess(shortCall, portfolio, Decimal.zero(), SCENARIO_LIMITS);
			expect(a.violations).toEqual(["Covered call needs 200 shares of SPY, holding 150"]);
		});

		it("passes when enough shares are held", () => {
			const portfolio = emptyPortfolio({ positions: [position("SPY", 200, 0)] });
			const a = assess(shortCall, portfolio, Decimal.zero(), SCENARIO_LIMITS);
			expect(a.approved).toBe(true);
		});

		it("ignores shares of other symbols", () => {
			const portfolio = emptyPortfolio({ positions: [position("QQQ", 500, 0)] });
			const a = assess(shortCall, portfolio, Decimal.zero(), SCENARIO_LIMITS);
			expect(a.violations).toEqual(["Covered call needs 200 shares of SPY, holding 0"]);
		});

		it("does not count option contracts as shares", () => {
			const portfolio = emptyPortfolio({
				positions: [position("SPY", 150, 0), position("SPY", 300, 0, PositionKind.Option)],
			});
			const a = assess(shortCall, portfolio, Decimal.zero(), SCENARIO_LIMITS);
			expect(a.violations).toEqual(["Covered call needs 200 shares of SPY, holding 150"]);
		});
	});

	describe("warnings", () => {
		it("warns moderate between 50 and 75", () => {
			const { assessor, portfolio } = setup({ ...SCENARIO_LIMITS, maxLossPerTrade: 5000 });
			const a = assessor.assess(
				ironCondor({ declaredMaxRisk: Decimal.from(2500) }),
				portfolio,
				Decimal.zero(),
			);
			// 20 + 3.75 + 30
			expect(a.riskScore).toBeCloseTo(53.75, 10);
			expect(a.warnings).toEqual([RiskWarning.Moderate]);
		});

		it("warns high above 75", () => {
			const { assessor, portfolio } = setup();
			const a = assessor.assess(
				ironCondor({ declaredMaxRisk: Decimal.from(5000) }),
				portfolio,
				Decimal.zero(),
			);
			// 40 + 7.5 + 30
			expect(a.riskScore).toBeCloseTo(77.5, 10);
			expect(a.warnings).toEqual([RiskWarning.High]);
		});

		it("caps each term so the total never passes 100", () => {
			const { assessor } = setup();
			const portfolio = emptyPortfolio({ positions: [position("QQQ", 1000, 50)] });
			const a = assessor.assess(
				ironCondor({ declaredMaxRisk: Decimal.from(1_000_000) }),
				portfolio,
				Decimal.from(1_000_000),
			);
			expect(a.riskScore).toBe(100);
		});
	});

	describe("disabled checks", () => {
		it("approves with a single warning and still computes the score", () => {
			const { assessor, portfolio } = setup({ ...SCENARIO_LIMITS, enableRiskChecks: false });
			const a = assessor.assess(
				ironCondor({ declaredMaxRisk: Decimal.from(1500) }),
				portfolio,
				Decimal.zero(),
			);
			expect(a.approved).toBe(true);
			expect(a.violations).toEqual([]);
			expect(a.warnings).toEqual(["Risk checks are disabled"]);
			expect(a.riskScore).toBeCloseTo(36.75, 10);
		});
	});

	describe("checkMarginRequirements", () => {
		it("compares declared max risk with cash", () => {
			const { assessor } = setup();
			const short = assessor.checkMarginRequirements(ironCondor(), emptyPortfolio({ cash: 200 }));
			expect(short.sufficient).toBe(false);
			expect(short.required.toNumber()).toBe(290);
			expect(short.available.toNumber()).toBe(200);

			const enough = assessor.checkMarginRequirements(ironCondor(), emptyPortfolio({ cash: 290 }));
			expect(enough.sufficient).toBe(true);
		});
	});

	it("does not mutate or depend on call history", () => {
		const { assessor, portfolio } = setup();
		const c = ironCondor();
		const first = assessor.assess(c, portfolio, Decimal.zero());
		const second = assessor.assess(c, portfolio, Decimal.zero());
		expect(second).toEqual(first);
		expect(c.declaredMaxRisk.toNumber()).toBe(290);
	});

	it("exposes its limits", () => {
		expect(RiskAssessor.create(SCENARIO_LIMITS).riskLimits).toBe(SCENARIO_LIMITS);
	});
});

describe("portfolioExposureOf", () => {
	it("sums absolute quantities", () => {
		const portfolio = emptyPortfolio({
			positions: [position("SPY", 2, 3.5), position("QQQ", -1, 2)],
		});
		expect(portfolioExposureOf(portfolio, Decimal.from(10), 100).toNumber()).toBe(910);
	});
});
