import {
	average,
	roundTo,
	type SupportResistanceKind,
	type SupportResistanceZone,
	type SwingSeries,
} from "@marketlens/core";

export interface ClusterOptions {
	/** Band half-width as a fraction of the seed level. */
	tolerance: number;
	minTouches: number;
	maxZones: number;
}

interface SwingLevel {
	price: number;
	index: number;
}

const collectLevels = (series: SwingSeries, into: SwingLevel[]): void => {
	series.forEach((price, index) => {
		if (price !== null) {
			into.push({ price, index });
		}
	});
};

/**
 * Greedy single-pass clustering of swing levels into support/resistance
 * zones. Highs are scanned before lows; each unclaimed level seeds a band of
 * `seed * tolerance` and pulls in every later unclaimed level inside it.
 * Only clusters with at least `minTouches` members are kept and claimed.
 *
 * Survivors are ranked by strength and cut to `maxZones` first; the
 * remaining zones are then ordered by distance to `currentPrice`.
 */
export const clusterSupportResistance = (
	swingHighs: SwingSeries,
	swingLows: SwingSeries,
	currentPrice: number,
	options: ClusterOptions
): SupportResistanceZone[] => {
	const levels: SwingLevel[] = [];
	collectLevels(swingHighs, levels);
	collectLevels(swingLows, levels);

	const claimed = new Array<boolean>(levels.length).fill(false);
	const zones: SupportResistanceZone[] = [];

	for (let i = 0; i < levels.length; i += 1) {
		if (claimed[i]) {
			continue;
		}

		const seed = levels[i];
		const band = seed.price * options.tolerance;
		const members = [i];
		for (let j = i + 1; j < levels.length; j += 1) {
			if (!claimed[j] && Math.abs(levels[j].price - seed.price) <= band) {
				members.push(j);
			}
		}

		if (members.length < options.minTouches) {
			continue;
		}

		const prices = members.map((member) => levels[member].price);
		const mean = average(prices);
		const kind: SupportResistanceKind = mean < currentPrice ? "support" : "resistance";
		zones.push({
			kind,
			level: roundTo(mean, 2),
			top: roundTo(Math.max(...prices), 2),
			bottom: roundTo(Math.min(...prices), 2),
			index: seed.index,
			strength: members.length,
			distance: Math.abs(currentPrice - mean),
		});
		for (const member of members) {
			claimed[member] = true;
		}
	}

	// Strength decides which zones survive the cut; distance only orders them.
	const strongest = [...zones]
		.sort((a, b) => b.strength - a.strength)
		.slice(0, options.maxZones);
	return strongest.sort((a, b) => a.distance - b.distance);
};

/**
 * Closest zone to the current price, optionally restricted to one side.
 * Expects zones in distance order, as returned by `clusterSupportResistance`.
 */
export const nearestZone = (
	zones: readonly SupportResistanceZone[],
	kind?: SupportResistanceKind
): SupportResistanceZone | null =>
	zones.find((zone) => kind === undefined || zone.kind === kind) ?? null;
