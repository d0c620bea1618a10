import { describe, expect, it } from "vitest";
import { isErr, isOk } from "../shared/result.js";
import {
	canTransitionTo,
	isActive,
	isCompensation,
	isTerminal,
	tryTransition,
} from "./order-state-machine.js";
import { ORDER_STATUSES, OrderStatus } from "./types.js";

describe("OrderStateMachine", () => {
	describe("isTerminal", () => {
		it.each([
			[OrderStatus.Filled, true],
			[OrderStatus.Rejected, true],
			[OrderStatus.Cancelled, true],
			[OrderStatus.Pending, false],
			[OrderStatus.Staged, false],
			[OrderStatus.Approved, false],
			[OrderStatus.Submitted, false],
			[OrderStatus.PartiallyFilled, false],
		] as const)("%s is terminal: %s", (status, expected) => {
			expect(isTerminal(status)).toBe(expected);
			expect(isActive(status)).toBe(!expected);
		});
	});

	describe("canTransitionTo — valid transitions", () => {
		it.each([
			[OrderStatus.Pending, OrderStatus.Staged],
			[OrderStatus.Staged, OrderStatus.Approved],
			[OrderStatus.Staged, OrderStatus.Rejected],
			[OrderStatus.Staged, OrderStatus.Cancelled],
			[OrderStatus.Approved, OrderStatus.Submitted],
			[OrderStatus.Approved, OrderStatus.Rejected],
			[OrderStatus.Approved, OrderStatus.Cancelled],
			[OrderStatus.Submitted, OrderStatus.PartiallyFilled],
			[OrderStatus.Submitted, OrderStatus.Filled],
			[OrderStatus.PartiallyFilled, OrderStatus.PartiallyFilled],
			[OrderStatus.PartiallyFilled, OrderStatus.Filled],
		] as const)("%s → %s is valid", (from, to) => {
			expect(canTransitionTo(from, to)).toBe(true);
		});
	});

	describe("canTransitionTo — invalid transitions", () => {
		it.each([
			[OrderStatus.Staged, OrderStatus.Submitted],
			[OrderStatus.Approved, OrderStatus.Staged],
			[OrderStatus.Submitted, OrderStatus.Cancelled],
			[OrderStatus.Submitted, OrderStatus.Rejected],
			[OrderStatus.PartiallyFilled, OrderStatus.Cancelled],
			[OrderStatus.Pending, OrderStatus.Approved],
		] as const)("%s → %s is invalid", (from, to) => {
			expect(canTransitionTo(from, to)).toBe(false);
		});

		it("allows nothing out of a terminal status", () => {
			for (const from of [OrderStatus.Filled, OrderStatus.Rejected, OrderStatus.Cancelled]) {
				for (const to of ORDER_STATUSES) {
					expect(canTransitionTo(from, to)).toBe(false);
				}
			}
		});
	});

	describe("isCompensation", () => {
		it("recognises rollbacks of strategy-level moves", () => {
			expect(isCompensation(OrderStatus.Approved, OrderStatus.Staged)).toBe(true);
			expect(isCompensation(OrderStatus.Rejected, OrderStatus.Approved)).toBe(true);
			expect(isCompensation(OrderStatus.Cancelled, OrderStatus.Staged)).toBe(true);
		});

		it("does not treat forward moves or fill rollbacks as compensations", () => {
			expect(isCompensation(OrderStatus.Staged, OrderStatus.Approved)).toBe(false);
			expect(isCompensation(OrderStatus.Filled, OrderStatus.Submitted)).toBe(false);
		});
	});

	describe("tryTransition", () => {
		it("returns the target status when allowed", () => {
			const r = tryTransition(OrderStatus.Staged, OrderStatus.Approved);
			expect(isOk(r)).toBe(true);
			if (r.ok) expect(r.value).toBe(OrderStatus.Approved);
		});

		it("describes a refused transition", () => {
			const r = tryTransition(OrderStatus.Filled, OrderStatus.Cancelled);
			expect(isErr(r)).toBe(true);
			if (!r.ok) expect(r.error).toBe("Invalid transition: FILLED → CANCELLED");
		});
	});
});
