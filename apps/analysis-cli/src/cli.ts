import fs from "node:fs";
import path from "node:path";
import process from "node:process";
import {
	createLogger,
	getConfigMetadata,
	loadAnalysisConfig,
	setLogStream,
	type MarketCandle,
} from "@marketlens/core";
import { CcxtMarketDataClient, loadCandlesFromFile } from "@marketlens/data";
import {
	parseCliArgs,
	parseOperations,
	parsePositiveInteger,
	readStringArg,
	type ArgMap,
} from "./cliArgs";
import { runAnalysis } from "./runAnalysis";

const logger = createLogger("analysis:cli");

const DEFAULT_TIMEFRAME = "1h";
const DEFAULT_LIMIT = 500;

const USAGE = `Usage:
  marketlens-analyze --file <candles.json> [options]
  marketlens-analyze --exchange binance --symbol BTC/USDT --timeframe 1h [options]

Options:
  --file <path>          JSON candles: objects {open,high,low,close,...} or
                         ccxt rows [ts, o, h, l, c, v]
  --exchange <id>        ccxt exchange id (binance | mexc)
  --symbol <symbol>      Market symbol for --exchange
  --timeframe <tf>       Candle timeframe for --exchange (default ${DEFAULT_TIMEFRAME})
  --limit <n>            Number of candles to fetch (default ${DEFAULT_LIMIT})
  --operation <op>       indicators | patterns | structure | all (default all),
                         comma separated for a subset
  --profile <name>       Analysis profile under configs/analysis (default "default")
  --configDir <path>     Custom config directory
  --envPath <path>       Custom .env path
  --out <path>           Write the result JSON to a file instead of stdout
  --help                 Show this message
`;

const loadCandles = async (args: ArgMap): Promise<MarketCandle[]> => {
	const file = readStringArg(args, "file");
	const exchange = readStringArg(args, "exchange");
	const symbol = readStringArg(args, "symbol");
	const timeframe = readStringArg(args, "timeframe") ?? DEFAULT_TIMEFRAME;

	if (file && exchange) {
		throw new Error("Use either --file or --exchange, not both");
	}
	if (file) {
		const candles = loadCandlesFromFile(path.resolve(file), { symbol, timeframe });
		logger.info("candles_loaded", { source: "file", file, count: candles.length });
		return candles;
	}
	if (exchange) {
		if (!symbol) {
			throw new Error("Missing required --symbol for --exchange");
		}
		const limit = parsePositiveInteger(readStringArg(args, "limit"), "limit", DEFAULT_LIMIT);
		const client = CcxtMarketDataClient.forExchange(exchange, logger);
		const candles = await client.fetchOHLCV(symbol, timeframe, limit);
		logger.info("candles_loaded", {
			source: "exchange",
			exchange,
			symbol,
			timeframe,
			count: candles.length,
		});
		return candles;
	}
	throw new Error("Missing candle source: pass --file <path> or --exchange <id>");
};

export type OutputWriter = (text: string) => void;

const writeStdout: OutputWriter = (text) => {
	process.stdout.write(`${text}\n`);
};

/**
 * Parses `argv`, runs the analysis and hands the result JSON to `write`.
 * Log lines go to stderr so stdout carries only the result.
 */
export const runCli = async (
	argv: string[],
	write: OutputWriter = writeStdout
): Promise<void> => {
	setLogStream("stderr");
	const args = parseCliArgs(argv);
	if (args.help) {
		write(USAGE);
		return;
	}

	const operations = parseOperations(readStringArg(args, "operation"));
	const config = loadAnalysisConfig({
		envPath: readStringArg(args, "envPath"),
		configDir: readStringArg(args, "configDir"),
		profile: readStringArg(args, "profile"),
	});
	const metadata = getConfigMetadata(config);
	logger.info("config_loaded", {
		profile: metadata?.profile,
		source: metadata?.source,
		path: metadata?.path,
	});

	const candles = await loadCandles(args);
	const { result, counts } = runAnalysis(candles, operations, config);

	logger.info("analysis_summary", {
		candles: candles.length,
		operations: operations.join(","),
		counts,
	});

	const payload = JSON.stringify(result, null, 2);
	const out = readStringArg(args, "out");
	if (out) {
		const outputPath = path.resolve(out);
		fs.mkdirSync(path.dirname(outputPath), { recursive: true });
		fs.writeFileSync(outputPath, payload);
		logger.info("analysis_written", { path: outputPath });
	} else {
		write(payload);
	}
};

