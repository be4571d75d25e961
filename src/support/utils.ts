import { PacketError } from "../exceptions.js";

const BINARY_LINE_LENGTH = 512;

export const DEBUG = 10;

export interface Logger {
	isEnabledFor?(level: number): boolean;
	debug(...args: unknown[]): void;
}

function shorten(text: string, length: number): string {
	return text.length < length ? text : `${text.slice(0, length - 3)}...`;
}

function logValue(value: unknown): string {
	if (value === null || value === undefined) return "";
	if (Buffer.isBuffer(value)) {
		return value.toString("hex");
	}
	return String(value);
}

function debugEnabled(name: string): boolean {
	const modules = (process.env.RTPWIRE_DEBUG ?? "")
		.split(",")
		.map((m) => m.trim())
		.filter((m) => m.length > 0);
	return modules.includes("*") || modules.includes(name);
}

/**
 * Create a module logger. Output is only produced for modules listed in
 * RTPWIRE_DEBUG (comma separated, "*" enables everything).
 */
export function createLogger(name: string): Logger {
	return {
		isEnabledFor: (level: number) => level >= DEBUG && debugEnabled(name),
		debug: (...args: unknown[]) => {
			if (!debugEnabled(name)) return;
			const [format, ...rest] = args;
			console.debug(`[${name}] ${String(format)}`, ...rest);
		},
	};
}

export function logBinary(
	logger: Logger,
	message: string,
	kwargs: Record<string, unknown> = {},
	level = DEBUG,
): void {
	if (logger.isEnabledFor && !logger.isEnabledFor(level)) return;

	const overrideLength = Number.parseInt(
		process.env.RTPWIRE_BINARY_MAX_LINE ?? "0",
		10,
	);
	const lineLength = overrideLength || BINARY_LINE_LENGTH;

	const parts = Object.keys(kwargs)
		.sort()
		.map((k) => `${k}=${shorten(logValue(kwargs[k]), lineLength)}`);

	logger.debug("%s (%s)", message, parts.join(", "));
}

/**
 * Run `func`, prefixing `label` to the context of any packet error it throws.
 */
export function withContext<T>(label: string, func: () => T): T {
	try {
		return func();
	} catch (ex) {
		if (ex instanceof PacketError) {
			throw ex.addContext(label);
		}
		throw ex;
	}
}

export function hex(value: number, width = 2): string {
	return `0x${value.toString(16).padStart(width, "0")}`;
}
