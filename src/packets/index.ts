export {
	BasePacket,
	type PacketDecoder,
	type RtcpPacket,
} from "./base.js";
export { Goodbye } from "./goodbye.js";
export { PictureLossIndication } from "./pictureLossIndication.js";
export { RapidResynchronizationRequest } from "./rapidResynchronizationRequest.js";
export { RawPacket } from "./rawPacket.js";
export {
	BITRATE_MAX,
	ReceiverEstimatedMaximumBitrate,
	type ReceiverEstimatedMaximumBitrateInit,
} from "./receiverEstimatedMaximumBitrate.js";
export { ReceiverReport, type ReceiverReportInit } from "./receiverReport.js";
export {
	RECEPTION_REPORT_LENGTH,
	ReceptionReport,
	type ReceptionReportInit,
} from "./receptionReport.js";
export { SenderReport, type SenderReportInit } from "./senderReport.js";
export {
	SliceLossIndication,
	type SliceLossIndicationInit,
	type SliEntry,
} from "./sliceLossIndication.js";
export {
	SourceDescription,
	type SourceDescriptionChunk,
	type SourceDescriptionItem,
} from "./sourceDescription.js";
export {
	type NackPair,
	nackPairPackets,
	nackPairsFromSequenceNumbers,
	TransportLayerNack,
	type TransportLayerNackInit,
} from "./transportLayerNack.js";
export type { FeedbackInit } from "./feedback.js";
