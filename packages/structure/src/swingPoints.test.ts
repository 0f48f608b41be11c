import { describe, expect, it } from "vitest";
import { findSwingPoints } from "./swingPoints";

describe("findSwingPoints", () => {
	it("marks the single peak of a unimodal series", () => {
		const high = [1, 2, 3, 4, 5, 10, 5, 4, 3, 2, 1];
		const low = high.map((value) => value - 0.5);
		const { swingHighs, swingLows } = findSwingPoints(high, low, 5);
		expect(swingHighs).toEqual([null, null, null, null, null, 10, null, null, null, null, null]);
		expect(swingLows).toEqual(new Array(11).fill(null));
	});

	it("finds highs and lows independently", () => {
		const { swingHighs, swingLows } = findSwingPoints([1, 3, 2, 4, 1], [5, 2, 4, 1, 5], 1);
		expect(swingHighs).toEqual([null, 3, null, 4, null]);
		expect(swingLows).toEqual([null, 2, null, 1, null]);
	});

	it("never produces a pivot on a tie", () => {
		const { swingHighs, swingLows } = findSwingPoints([1, 3, 3, 1], [5, 2, 2, 5], 1);
		expect(swingHighs).toEqual([null, null, null, null]);
		expect(swingLows).toEqual([null, null, null, null]);
	});

	it("leaves series shorter than the window empty", () => {
		const { swingHighs, swingLows } = findSwingPoints([1, 5, 1], [1, 0, 1], 5);
		expect(swingHighs).toEqual([null, null, null]);
		expect(swingLows).toEqual([null, null, null]);
	});
});
