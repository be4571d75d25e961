import { describe, expect, it } from "vitest";
import { ZodError } from "zod";
import { createSettings, DEFAULT_SETTINGS } from "../src/settings.js";

describe("createSettings", () => {
	it("fills in defaults", () => {
		expect(createSettings()).toEqual({
			rtp: { copyPayload: false },
			demux: {
				rtcpPacketTypes: { min: 200, max: 211 },
				conflictRange: { min: 192, max: 223 },
			},
		});
		expect(DEFAULT_SETTINGS).toEqual(createSettings({}));
	});

	it("keeps given values", () => {
		const settings = createSettings({ rtp: { copyPayload: true } });
		expect(settings.rtp.copyPayload).toBe(true);
		expect(settings.demux.rtcpPacketTypes).toEqual({ min: 200, max: 211 });
	});

	it("rejects inverted ranges", () => {
		expect(() =>
			createSettings({ demux: { rtcpPacketTypes: { min: 210, max: 200 } } }),
		).toThrow(ZodError);
	});

	it("rejects RTCP types outside the conflict range", () => {
		expect(() =>
			createSettings({
				demux: {
					rtcpPacketTypes: { min: 190, max: 211 },
					conflictRange: { min: 192, max: 223 },
				},
			}),
		).toThrow("RTCP packet types must lie within the conflict range");
	});

	it("rejects values beyond a byte", () => {
		expect(() =>
			createSettings({ demux: { conflictRange: { min: 0, max: 256 } } }),
		).toThrow(ZodError);
	});
});
