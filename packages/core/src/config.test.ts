import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import {
	DEFAULT_ANALYSIS_CONFIG,
	getConfigMetadata,
	loadAnalysisConfig,
	resolveAnalysisConfig,
} from "./config";

const FIXTURE_DIR = fileURLToPath(new URL("./__tests__/fixtures", import.meta.url));
const MISSING_ENV = fileURLToPath(new URL("./__tests__/fixtures/.env.none", import.meta.url));

describe("resolveAnalysisConfig", () => {
	it("returns the fixed defaults when nothing is overridden", () => {
		expect(resolveAnalysisConfig()).toEqual({
			indicators: { emaFastPeriod: 50, emaSlowPeriod: 200, rsiPeriod: 14, atrPeriod: 14 },
			structure: {
				pivotLegs: 5,
				srTolerance: 0.002,
				srMinTouches: 2,
				sweepLookback: 20,
				srMaxZones: 5,
				rejectionWindow: 10,
				rejectionAtrFactor: 0.5,
			},
		});
	});

	it("rejects a negative rejection ATR factor", () => {
		expect(() =>
			resolveAnalysisConfig({ structure: { rejectionAtrFactor: -0.5 } })
		).toThrowError("structure.rejectionAtrFactor must not be negative, got -0.5");
	});

	it("rejects a tolerance outside [0, 1)", () => {
		expect(() => resolveAnalysisConfig({ structure: { srTolerance: 1.5 } })).toThrowError(
			/structure.srTolerance must be within/
		);
	});
});

describe("loadAnalysisConfig", () => {
	it("merges a partial profile over the defaults", () => {
		const config = loadAnalysisConfig({
			configDir: FIXTURE_DIR,
			profile: "tight",
			envPath: MISSING_ENV,
		});
		expect(config.indicators).toEqual({
			...DEFAULT_ANALYSIS_CONFIG.indicators,
			rsiPeriod: 7,
		});
		expect(config.structure.pivotLegs).toBe(3);
		expect(config.structure.srTolerance).toBe(0.001);
		expect(config.structure.sweepLookback).toBe(20);
		expect(getConfigMetadata(config)).toMatchObject({ source: "file", profile: "tight" });
	});

	it("falls back to the embedded defaults when the default profile is absent", () => {
		const config = loadAnalysisConfig({
			configDir: FIXTURE_DIR,
			profile: "default",
			envPath: MISSING_ENV,
		});
		expect(config).toEqual(resolveAnalysisConfig());
		expect(getConfigMetadata(config)).toEqual({ source: "embedded", profile: "default" });
	});

	it("throws when a named profile does not exist", () => {
		expect(() =>
			loadAnalysisConfig({ configDir: FIXTURE_DIR, profile: "nope", envPath: MISSING_ENV })
		).toThrowError(/Analysis config not found/);
	});

	it("throws when a window is not a positive integer", () => {
		expect(() =>
			loadAnalysisConfig({ configDir: FIXTURE_DIR, profile: "bad-legs", envPath: MISSING_ENV })
		).toThrowError("structure.pivotLegs must be a positive integer, got 0");
	});

	it("throws when a numeric field has the wrong type", () => {
		expect(() =>
			loadAnalysisConfig({
				configDir: FIXTURE_DIR,
				profile: "missing-period",
				envPath: MISSING_ENV,
			})
		).toThrowError("Required numeric field missing in indicators.atrPeriod");
	});

	it("throws when the file is not a JSON object", () => {
		expect(() =>
			loadAnalysisConfig({
				configDir: FIXTURE_DIR,
				profile: "not-an-object",
				envPath: MISSING_ENV,
			})
		).toThrowError(/must be a JSON object/);
	});
});
