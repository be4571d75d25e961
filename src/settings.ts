import { z } from "zod";

/** RTCP packet types registered by RFC 3550, 4585, 3611 and 5760. */
export const DEFAULT_RTCP_MIN_TYPE = 200;
export const DEFAULT_RTCP_MAX_TYPE = 211;

/** Second-byte values where RTP and RTCP may collide (RFC 5761 section 4). */
export const DEFAULT_CONFLICT_MIN = 192;
export const DEFAULT_CONFLICT_MAX = 223;

const byteSchema = z.number().int().min(0).max(255);

const rangeSchema = z
	.object({
		min: byteSchema,
		max: byteSchema,
	})
	.refine((range) => range.min <= range.max, {
		message: "range minimum must not exceed its maximum",
	});

const rtpSettingsSchema = z.object({
	copyPayload: z.boolean().default(false),
});

const demuxSettingsSchema = z
	.object({
		rtcpPacketTypes: rangeSchema.default({
			min: DEFAULT_RTCP_MIN_TYPE,
			max: DEFAULT_RTCP_MAX_TYPE,
		}),
		conflictRange: rangeSchema.default({
			min: DEFAULT_CONFLICT_MIN,
			max: DEFAULT_CONFLICT_MAX,
		}),
	})
	.refine(
		(demux) =>
			demux.rtcpPacketTypes.min >= demux.conflictRange.min &&
			demux.rtcpPacketTypes.max <= demux.conflictRange.max,
		{ message: "RTCP packet types must lie within the conflict range" },
	);

const settingsSchema = z.object({
	rtp: rtpSettingsSchema.default(() => rtpSettingsSchema.parse({})),
	demux: demuxSettingsSchema.default(() => demuxSettingsSchema.parse({})),
});

export type RtpSettings = z.infer<typeof rtpSettingsSchema>;
export type DemuxSettings = z.infer<typeof demuxSettingsSchema>;
export type Settings = z.infer<typeof settingsSchema>;
export type SettingsInput = z.input<typeof settingsSchema>;

export { rtpSettingsSchema, demuxSettingsSchema, settingsSchema };

export function createSettings(input?: SettingsInput): Settings {
	return settingsSchema.parse(input ?? {});
}

export const DEFAULT_SETTINGS: Settings = createSettings();
