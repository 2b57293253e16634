/** Protocol version carried in every RTCP header (RFC 3550). */
export const RTP_VERSION = 2;

export const HEADER_LENGTH = 4;
export const SSRC_LENGTH = 4;

/** Highest value that fits the 5-bit count/format field. */
export const COUNT_MAX = 0x1f;

/** Largest value of the 16-bit length field. */
export const LENGTH_MAX = 0xffff;

export enum PacketType {
	SenderReport = 200,
	ReceiverReport = 201,
	SourceDescription = 202,
	Goodbye = 203,
	ApplicationDefined = 204,
	TransportSpecificFeedback = 205,
	PayloadSpecificFeedback = 206,
}

/** Feedback message types, carried in the count field of RTPFB/PSFB headers. */
export enum FeedbackFormat {
	TransportLayerNack = 1,
	RapidResynchronizationRequest = 5,
	PictureLossIndication = 1,
	SliceLossIndication = 2,
	ReceiverEstimatedMaximumBitrate = 15,
}

export enum SdesType {
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

export enum VersionPolicy {
	Strict = "strict",
	Lenient = "lenient",
}

export function packetTypeName(type: number): string {
	return PacketType[type] ?? `Unknown(${type})`;
}
