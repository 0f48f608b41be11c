export type ArgValue = string | boolean;

export type ArgMap = Record<string, ArgValue>;

export const OPERATIONS = ["indicators", "patterns", "structure"] as const;

export type Operation = (typeof OPERATIONS)[number];

const isOperation = (value: string): value is Operation =>
	OPERATIONS.some((operation) => operation === value);

export const parseCliArgs = (argv: string[]): ArgMap => {
	const args: ArgMap = {};
	const positionals: string[] = [];
	for (let i = 0; i < argv.length; i++) {
		const token = argv[i];
		if (!token.startsWith("--")) {
			positionals.push(token);
			continue;
		}
		const eqIdx = token.indexOf("=");
		if (eqIdx !== -1) {
			const key = token.slice(2, eqIdx);
			const value = token.slice(eqIdx + 1);
			args[key] = value;
			continue;
		}
		const key = token.slice(2);
		const next = argv[i + 1];
		if (next && !next.startsWith("--")) {
			args[key] = next;
			i += 1;
		} else {
			args[key] = true;
		}
	}
	if (positionals[0] && args.file === undefined) {
		args.file = positionals[0];
	}
	return args;
};

/** A bare flag (`--symbol` with no value) counts as missing. */
export const readStringArg = (args: ArgMap, key: string): string | undefined => {
	const value = args[key];
	return typeof value === "string" && value.length > 0 ? value : undefined;
};

export const parsePositiveInteger = (
	value: string | undefined,
	label: string,
	fallback: number
): number => {
	if (value === undefined) {
		return fallback;
	}
	const num = Number(value);
	if (!Number.isInteger(num) || num <= 0) {
		throw new Error(`Invalid positive integer for --${label}: ${value}`);
	}
	return num;
};

export const parseOperations = (value: string | undefined): Operation[] => {
	if (value === undefined || value === "all") {
		return [...OPERATIONS];
	}
	const requested = value
		.split(",")
		.map((entry) => entry.trim())
		.filter((entry) => entry.length > 0);
	const operations: Operation[] = [];
	for (const entry of requested) {
		if (!isOperation(entry)) {
			throw new Error(
				`Unknown --operation "${entry}". Expected one of: ${OPERATIONS.join(", ")}, all`
			);
		}
		if (!operations.includes(entry)) {
			operations.push(entry);
		}
	}
	if (!operations.length) {
		throw new Error("--operation requires at least one operation");
	}
	return operations;
};
