export const RTP_VERSION = 2;
export const RTCP_VERSION = 2;

export const RTP_HEADER_LENGTH = 12;
export const RTCP_HEADER_LENGTH = 4;
export const MAX_CSRC_COUNT = 15;

export const ONE_BYTE_PROFILE = 0xbede;
/** Two-byte profile with the low nibble (app bits) masked off. */
export const TWO_BYTE_PROFILE = 0x1000;
export const TWO_BYTE_PROFILE_MASK = 0xfff0;

export enum RtcpPacketType {
	SenderReport = 200,
	ReceiverReport = 201,
	SourceDescription = 202,
	Goodbye = 203,
	ApplicationDefined = 204,
	TransportFeedback = 205,
	PayloadFeedback = 206,
	ExtendedReport = 207,
}

export enum TransportFeedbackFormat {
	Nack = 1,
	TransportWideCc = 15,
}

export enum PayloadFeedbackFormat {
	PictureLossIndication = 1,
	FullIntraRequest = 4,
}

export enum PacketStatus {
	NotReceived = 0,
	ReceivedSmallDelta = 1,
	ReceivedLargeOrNegativeDelta = 2,
	Reserved = 3,
}

export enum SdesItemType {
	End = 0,
	Cname = 1,
	Name = 2,
	Email = 3,
	Phone = 4,
	Location = 5,
	Tool = 6,
	Note = 7,
	Private = 8,
}
