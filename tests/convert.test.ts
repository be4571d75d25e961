import { describe, expect, it } from "vitest";
import { PacketStatus, RtcpPacketType, SdesItemType } from "../src/const.js";
import {
	feedbackFormatStr,
	packetStatusStr,
	rtcpPacketTypeStr,
	sdesItemTypeStr,
} from "../src/convert.js";

describe("rtcpPacketTypeStr", () => {
	it("converts all packet types", () => {
		expect(rtcpPacketTypeStr(RtcpPacketType.SenderReport)).toBe("SR");
		expect(rtcpPacketTypeStr(RtcpPacketType.ReceiverReport)).toBe("RR");
		expect(rtcpPacketTypeStr(RtcpPacketType.SourceDescription)).toBe("SDES");
		expect(rtcpPacketTypeStr(RtcpPacketType.Goodbye)).toBe("BYE");
		expect(rtcpPacketTypeStr(RtcpPacketType.ApplicationDefined)).toBe("APP");
		expect(rtcpPacketTypeStr(RtcpPacketType.TransportFeedback)).toBe("RTPFB");
		expect(rtcpPacketTypeStr(RtcpPacketType.PayloadFeedback)).toBe("PSFB");
		expect(rtcpPacketTypeStr(RtcpPacketType.ExtendedReport)).toBe("XR");
		expect(rtcpPacketTypeStr(210)).toBe("Unknown(210)");
	});
});

describe("feedbackFormatStr", () => {
	it("converts transport feedback formats", () => {
		expect(feedbackFormatStr(205, 1)).toBe("NACK");
		expect(feedbackFormatStr(205, 15)).toBe("TWCC");
		expect(feedbackFormatStr(205, 3)).toBe("Unknown(3)");
	});

	it("converts payload feedback formats", () => {
		expect(feedbackFormatStr(206, 1)).toBe("PLI");
		expect(feedbackFormatStr(206, 4)).toBe("FIR");
		expect(feedbackFormatStr(206, 15)).toBe("Unknown(15)");
	});

	it("has no formats for other packet types", () => {
		expect(feedbackFormatStr(200, 1)).toBe("Unsupported");
	});
});

describe("packetStatusStr", () => {
	it("converts all packet statuses", () => {
		expect(packetStatusStr(PacketStatus.NotReceived)).toBe("NotReceived");
		expect(packetStatusStr(PacketStatus.ReceivedSmallDelta)).toBe(
			"ReceivedSmallDelta",
		);
		expect(packetStatusStr(PacketStatus.ReceivedLargeOrNegativeDelta)).toBe(
			"ReceivedLargeOrNegativeDelta",
		);
		expect(packetStatusStr(PacketStatus.Reserved)).toBe("Reserved");
		const invalid: number = 9;
		expect(packetStatusStr(invalid)).toBe("Unsupported");
	});
});

describe("sdesItemTypeStr", () => {
	it("converts all item types", () => {
		expect(sdesItemTypeStr(SdesItemType.End)).toBe("END");
		expect(sdesItemTypeStr(SdesItemType.Cname)).toBe("CNAME");
		expect(sdesItemTypeStr(SdesItemType.Name)).toBe("NAME");
		expect(sdesItemTypeStr(SdesItemType.Email)).toBe("EMAIL");
		expect(sdesItemTypeStr(SdesItemType.Phone)).toBe("PHONE");
		expect(sdesItemTypeStr(SdesItemType.Location)).toBe("LOC");
		expect(sdesItemTypeStr(SdesItemType.Tool)).toBe("TOOL");
		expect(sdesItemTypeStr(SdesItemType.Note)).toBe("NOTE");
		expect(sdesItemTypeStr(SdesItemType.Private)).toBe("PRIV");
		expect(sdesItemTypeStr(42)).toBe("Unknown(42)");
	});
});
