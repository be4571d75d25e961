import {
	PacketStatus,
	PayloadFeedbackFormat,
	RtcpPacketType,
	SdesItemType,
	TransportFeedbackFormat,
} from "./const.js";

export function rtcpPacketTypeStr(packetType: number): string {
	const map: Record<number, string> = {
		[RtcpPacketType.SenderReport]: "SR",
		[RtcpPacketType.ReceiverReport]: "RR",
		[RtcpPacketType.SourceDescription]: "SDES",
		[RtcpPacketType.Goodbye]: "BYE",
		[RtcpPacketType.ApplicationDefined]: "APP",
		[RtcpPacketType.TransportFeedback]: "RTPFB",
		[RtcpPacketType.PayloadFeedback]: "PSFB",
		[RtcpPacketType.ExtendedReport]: "XR",
	};
	return map[packetType] ?? `Unknown(${packetType})`;
}

export function feedbackFormatStr(packetType: number, format: number): string {
	if (packetType === RtcpPacketType.TransportFeedback) {
		const map: Record<number, string> = {
			[TransportFeedbackFormat.Nack]: "NACK",
			[TransportFeedbackFormat.TransportWideCc]: "TWCC",
		};
		return map[format] ?? `Unknown(${format})`;
	}
	if (packetType === RtcpPacketType.PayloadFeedback) {
		const map: Record<number, string> = {
			[PayloadFeedbackFormat.PictureLossIndication]: "PLI",
			[PayloadFeedbackFormat.FullIntraRequest]: "FIR",
		};
		return map[format] ?? `Unknown(${format})`;
	}
	return "Unsupported";
}

export function packetStatusStr(status: PacketStatus): string {
	const map: Record<number, string> = {
		[PacketStatus.NotReceived]: "NotReceived",
		[PacketStatus.ReceivedSmallDelta]: "ReceivedSmallDelta",
		[PacketStatus.ReceivedLargeOrNegativeDelta]: "ReceivedLargeOrNegativeDelta",
		[PacketStatus.Reserved]: "Reserved",
	};
	return map[status] ?? "Unsupported";
}

export function sdesItemTypeStr(itemType: number): string {
	const map: Record<number, string> = {
		[SdesItemType.End]: "END",
		[SdesItemType.Cname]: "CNAME",
		[SdesItemType.Name]: "NAME",
		[SdesItemType.Email]: "EMAIL",
		[SdesItemType.Phone]: "PHONE",
		[SdesItemType.Location]: "LOC",
		[SdesItemType.Tool]: "TOOL",
		[SdesItemType.Note]: "NOTE",
		[SdesItemType.Private]: "PRIV",
	};
	return map[itemType] ?? `Unknown(${itemType})`;
}
