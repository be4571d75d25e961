import { afterEach, describe, expect, it, vi } from "vitest";
import { MalformedHeaderError } from "../../src/exceptions.js";
import {
	createLogger,
	DEBUG,
	hex,
	logBinary,
	withContext,
} from "../../src/support/utils.js";

afterEach(() => {
	vi.unstubAllEnvs();
	vi.restoreAllMocks();
});

describe("withContext", () => {
	it("returns the function result", () => {
		expect(withContext("outer", () => 42)).toBe(42);
	});

	it("prefixes packet errors with the label", () => {
		expect(() =>
			withContext("outer", () =>
				withContext("inner", () => {
					throw new MalformedHeaderError("bad");
				}),
			),
		).toThrow("outer: inner: bad");
	});

	it("leaves other errors untouched", () => {
		expect(() =>
			withContext("outer", () => {
				throw new Error("plain");
			}),
		).toThrow(/^plain$/);
	});
});

describe("logBinary", () => {
	it("formats sorted keyword arguments", () => {
		const logger = { isEnabledFor: () => true, debug: vi.fn() };
		logBinary(logger, "Built", { seq: 5, data: Buffer.from([0xab, 0xcd]) });
		expect(logger.debug).toHaveBeenCalledWith(
			"%s (%s)",
			"Built",
			"data=abcd, seq=5",
		);
	});

	it("shortens long values", () => {
		vi.stubEnv("RTPWIRE_BINARY_MAX_LINE", "6");
		const logger = { isEnabledFor: () => true, debug: vi.fn() };
		logBinary(logger, "Built", { data: Buffer.from([0xab, 0xcd, 0xef, 0x01]) });
		expect(logger.debug).toHaveBeenCalledWith(
			"%s (%s)",
			"Built",
			"data=abc...",
		);
	});

	it("skips disabled loggers", () => {
		const logger = { isEnabledFor: () => false, debug: vi.fn() };
		logBinary(logger, "Built", { data: Buffer.from([1]) });
		expect(logger.debug).not.toHaveBeenCalled();
	});
});

describe("createLogger", () => {
	it("is silent unless the module is enabled", () => {
		const spy = vi.spyOn(console, "debug").mockImplementation(() => undefined);
		vi.stubEnv("RTPWIRE_DEBUG", "rtcp");
		const logger = createLogger("rtp");
		expect(logger.isEnabledFor?.(DEBUG)).toBe(false);
		logger.debug("hello");
		expect(spy).not.toHaveBeenCalled();
	});

	it("writes enabled modules to console.debug", () => {
		const spy = vi.spyOn(console, "debug").mockImplementation(() => undefined);
		vi.stubEnv("RTPWIRE_DEBUG", "demux, rtp");
		const logger = createLogger("rtp");
		expect(logger.isEnabledFor?.(DEBUG)).toBe(true);
		logger.debug("value %d", 3);
		expect(spy).toHaveBeenCalledWith("[rtp] value %d", 3);
	});

	it("enables every module with a wildcard", () => {
		vi.stubEnv("RTPWIRE_DEBUG", "*");
		expect(createLogger("anything").isEnabledFor?.(DEBUG)).toBe(true);
	});
});

describe("hex", () => {
	it("pads to the requested width", () => {
		expect(hex(0xbede, 4)).toBe("0xbede");
		expect(hex(5)).toBe("0x05");
	});
});
