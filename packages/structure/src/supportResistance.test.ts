import { describe, expect, it } from "vitest";
import { clusterSupportResistance, nearestZone } from "./supportResistance";

const options = { tolerance: 0.002, minTouches: 2, maxZones: 5 };

describe("clusterSupportResistance", () => {
	it("merges nearby levels and drops clusters below the touch count", () => {
		const zones = clusterSupportResistance(
			[null, 100.1, null, 150],
			[100, null, 100.2, null],
			120,
			options
		);
		expect(zones).toHaveLength(1);
		const [zone] = zones;
		expect(zone.strength).toBe(3);
		expect(zone.kind).toBe("support");
		expect(zone.level).toBe(100.1);
		expect(zone.top).toBe(100.2);
		expect(zone.bottom).toBe(100);
		expect(zone.index).toBe(1);
		expect(zone.distance).toBeCloseTo(19.9, 9);
	});

	it("measures the band from the seed, not from the running cluster", () => {
		const zones = clusterSupportResistance([100, 100.15, 100.3], [], 99, options);
		expect(zones).toHaveLength(1);
		expect(zones[0].strength).toBe(2);
		expect(zones[0].top).toBe(100.15);
		expect(zones[0].bottom).toBe(100);
	});

	it("classifies a level equal to the current price as resistance", () => {
		const zones = clusterSupportResistance([100, 100], [], 100, options);
		expect(zones).toEqual([
			{
				kind: "resistance",
				level: 100,
				top: 100,
				bottom: 100,
				index: 0,
				strength: 2,
				distance: 0,
			},
		]);
	});

	it("cuts by strength before ordering by distance", () => {
		const highs = [10, 10, 10, 10, 20, 20, 30, 30, 30, 40, 40, 50, 50, 60, 60];
		const zones = clusterSupportResistance(highs, [], 59, options);
		expect(zones.map((zone) => zone.level)).toEqual([50, 40, 30, 20, 10]);
		expect(zones.map((zone) => zone.strength)).toEqual([2, 2, 3, 2, 4]);
		expect(zones.every((zone) => zone.kind === "support")).toBe(true);
	});

	it("returns nothing without swing points", () => {
		expect(clusterSupportResistance([null, null], [null], 10, options)).toEqual([]);
	});
});

describe("nearestZone", () => {
	const zones = clusterSupportResistance([95, 95, 105, 105], [], 101, options);

	it("returns the closest zone on either side", () => {
		expect(nearestZone(zones)?.level).toBe(105);
	});

	it("filters by side", () => {
		expect(nearestZone(zones, "support")?.level).toBe(95);
		expect(nearestZone(zones, "resistance")?.level).toBe(105);
		expect(nearestZone([], "support")).toBeNull();
	});
});
