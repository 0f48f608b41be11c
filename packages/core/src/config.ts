import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";

export interface IndicatorConfig {
	emaFastPeriod: number;
	emaSlowPeriod: number;
	rsiPeriod: number;
	atrPeriod: number;
}

export interface StructureConfig {
	/** Half-width of the swing pivot window. */
	pivotLegs: number;
	/** Relative clustering band, as a fraction of the seed level. */
	srTolerance: number;
	srMinTouches: number;
	sweepLookback: number;
	srMaxZones: number;
	/** Candles scanned back for the swing level a rejection must touch. */
	rejectionWindow: number;
	/** Touch tolerance as a multiple of ATR. */
	rejectionAtrFactor: number;
}

export interface AnalysisConfig {
	indicators: IndicatorConfig;
	structure: StructureConfig;
}

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = Object.freeze({
	indicators: Object.freeze({
		emaFastPeriod: 50,
		emaSlowPeriod: 200,
		rsiPeriod: 14,
		atrPeriod: 14,
	}),
	structure: Object.freeze({
		pivotLegs: 5,
		srTolerance: 0.002,
		srMinTouches: 2,
		sweepLookback: 20,
		srMaxZones: 5,
		rejectionWindow: 10,
		rejectionAtrFactor: 0.5,
	}),
});

export type ConfigSourceType = "file" | "embedded";

export interface ConfigMetadata {
	path?: string;
	source: ConfigSourceType;
	profile: string;
}

export interface AnalysisConfigFile {
	indicators?: Partial<Record<keyof IndicatorConfig, unknown>>;
	structure?: Partial<Record<keyof StructureConfig, unknown>>;
}

export interface AnalysisConfigLoadOptions {
	configDir?: string;
	profile?: string;
	envPath?: string;
}

const CONFIG_META_SYMBOL = Symbol.for("marketlens.config.meta");

const WORKSPACE_SENTINELS = ["package-lock.json", ".git", "configs"];

let cachedWorkspaceRoot: string | undefined;
const loadedEnvPaths = new Set<string>();

const findWorkspaceRoot = (): string => {
	if (cachedWorkspaceRoot) {
		return cachedWorkspaceRoot;
	}

	let current = process.cwd();

	while (
		!WORKSPACE_SENTINELS.some((file) => fs.existsSync(path.join(current, file)))
	) {
		const parent = path.dirname(current);
		if (parent === current) {
			cachedWorkspaceRoot = process.cwd();
			return cachedWorkspaceRoot;
		}
		current = parent;
	}

	cachedWorkspaceRoot = current;
	return current;
};

const getDefaultConfigDir = (): string =>
	path.join(findWorkspaceRoot(), "configs");

const withConfigMetadata = <T extends object>(
	config: T,
	metadata: ConfigMetadata
): T => {
	Object.defineProperty(config, CONFIG_META_SYMBOL, {
		value: metadata,
		enumerable: false,
		configurable: true,
		writable: true,
	});
	return config;
};

export const getConfigMetadata = (config: object): ConfigMetadata | null => {
	const value: unknown = Object.getOwnPropertyDescriptor(
		config,
		CONFIG_META_SYMBOL
	)?.value;
	return isConfigMetadata(value) ? value : null;
};

const isConfigMetadata = (value: unknown): value is ConfigMetadata =>
	typeof value === "object" &&
	value !== null &&
	"source" in value &&
	"profile" in value;

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const readOptionalEnvVar = (key: string): string | undefined => {
	const value = process.env[key];
	if (typeof value !== "string") {
		return undefined;
	}
	const trimmed = value.trim();
	return trimmed.length ? trimmed : undefined;
};

const ensureNumber = (value: unknown, field: string): number => {
	if (typeof value !== "number" || !Number.isFinite(value)) {
		throw new Error(`Required numeric field missing in ${field}`);
	}
	return value;
};

const ensurePositiveInteger = (value: unknown, field: string): number => {
	const num = ensureNumber(value, field);
	if (!Number.isInteger(num) || num <= 0) {
		throw new Error(`${field} must be a positive integer, got ${num}`);
	}
	return num;
};

const ensureNonNegative = (value: unknown, field: string): number => {
	const num = ensureNumber(value, field);
	if (num < 0) {
		throw new Error(`${field} must not be negative, got ${num}`);
	}
	return num;
};

const ensureFraction = (value: unknown, field: string): number => {
	const num = ensureNumber(value, field);
	if (num < 0 || num >= 1) {
		throw new Error(`${field} must be within [0, 1), got ${num}`);
	}
	return num;
};

const readConfigFile = (filePath: string): AnalysisConfigFile => {
	const contents = fs.readFileSync(filePath, "utf-8");
	const parsed: unknown = JSON.parse(contents);
	if (!isRecord(parsed)) {
		throw new Error(`Analysis config at ${filePath} must be a JSON object`);
	}
	return {
		indicators: readSection(parsed, "indicators", filePath),
		structure: readSection(parsed, "structure", filePath),
	};
};

const readSection = (
	parsed: Record<string, unknown>,
	key: keyof AnalysisConfigFile,
	filePath: string
): Record<string, unknown> | undefined => {
	const section = parsed[key];
	if (section === undefined) {
		return undefined;
	}
	if (!isRecord(section)) {
		throw new Error(`"${key}" in ${filePath} must be an object`);
	}
	return section;
};

/**
 * Merges a partial config file over the defaults and checks every field.
 */
export const resolveAnalysisConfig = (
	file: AnalysisConfigFile = {}
): AnalysisConfig => {
	const indicators = { ...DEFAULT_ANALYSIS_CONFIG.indicators, ...file.indicators };
	const structure = { ...DEFAULT_ANALYSIS_CONFIG.structure, ...file.structure };
	return {
		indicators: {
			emaFastPeriod: ensurePositiveInteger(
				indicators.emaFastPeriod,
				"indicators.emaFastPeriod"
			),
			emaSlowPeriod: ensurePositiveInteger(
				indicators.emaSlowPeriod,
				"indicators.emaSlowPeriod"
			),
			rsiPeriod: ensurePositiveInteger(indicators.rsiPeriod, "indicators.rsiPeriod"),
			atrPeriod: ensurePositiveInteger(indicators.atrPeriod, "indicators.atrPeriod"),
		},
		structure: {
			pivotLegs: ensurePositiveInteger(structure.pivotLegs, "structure.pivotLegs"),
			srTolerance: ensureFraction(structure.srTolerance, "structure.srTolerance"),
			srMinTouches: ensurePositiveInteger(
				structure.srMinTouches,
				"structure.srMinTouches"
			),
			sweepLookback: ensurePositiveInteger(
				structure.sweepLookback,
				"structure.sweepLookback"
			),
			srMaxZones: ensurePositiveInteger(structure.srMaxZones, "structure.srMaxZones"),
			rejectionWindow: ensurePositiveInteger(
				structure.rejectionWindow,
				"structure.rejectionWindow"
			),
			rejectionAtrFactor: ensureNonNegative(
				structure.rejectionAtrFactor,
				"structure.rejectionAtrFactor"
			),
		},
	};
};

const loadEnv = (envPath = path.join(findWorkspaceRoot(), ".env")): void => {
	if (loadedEnvPaths.has(envPath)) {
		return;
	}
	if (fs.existsSync(envPath)) {
		dotenv.config({ path: envPath });
	}
	loadedEnvPaths.add(envPath);
};

const resolveAnalysisConfigPath = (
	configDir: string,
	profile: string
): string => {
	const fileName = profile.endsWith(".json") ? profile : `${profile}.json`;
	return path.join(configDir, "analysis", fileName);
};

/**
 * Loads `<configDir>/analysis/<profile>.json` over the built-in defaults.
 * The default profile may be absent on disk; any other profile must exist.
 */
export const loadAnalysisConfig = (
	options: AnalysisConfigLoadOptions = {}
): AnalysisConfig => {
	loadEnv(options.envPath);
	const profile =
		options.profile ?? readOptionalEnvVar("ANALYSIS_PROFILE") ?? "default";
	const configDir = options.configDir ?? getDefaultConfigDir();
	const configPath = resolveAnalysisConfigPath(configDir, profile);

	if (!fs.existsSync(configPath)) {
		if (profile !== "default") {
			throw new Error(`Analysis config not found at ${configPath}`);
		}
		return withConfigMetadata(resolveAnalysisConfig(), {
			source: "embedded",
			profile,
		});
	}

	return withConfigMetadata(resolveAnalysisConfig(readConfigFile(configPath)), {
		source: "file",
		path: configPath,
		profile,
	});
};
