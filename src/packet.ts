/**
 * Compound packet framing and dispatch.
 *
 * A datagram holds one or more self-framed RTCP packets back to back. Each is
 * sized by its header's length field, decoded by the decoder registered for
 * its (type, count/format) pair, and re-marshaled by concatenation.
 */

import {
	FeedbackFormat,
	HEADER_LENGTH,
	PacketType,
	packetTypeName,
	RTP_VERSION,
	VersionPolicy,
} from "./const.js";
import {
	BadVersionError,
	InvalidHeaderError,
	PacketTooShortError,
} from "./exceptions.js";
import { Header } from "./header.js";
import type { PacketDecoder, RtcpPacket } from "./packets/base.js";
import { Goodbye } from "./packets/goodbye.js";
import { PictureLossIndication } from "./packets/pictureLossIndication.js";
import { RapidResynchronizationRequest } from "./packets/rapidResynchronizationRequest.js";
import { RawPacket } from "./packets/rawPacket.js";
import { ReceiverEstimatedMaximumBitrate } from "./packets/receiverEstimatedMaximumBitrate.js";
import { ReceiverReport } from "./packets/receiverReport.js";
import { SenderReport } from "./packets/senderReport.js";
import { SliceLossIndication } from "./packets/sliceLossIndication.js";
import { SourceDescription } from "./packets/sourceDescription.js";
import { TransportLayerNack } from "./packets/transportLayerNack.js";
import { createUnmarshalSettings, type UnmarshalOptions } from "./settings.js";
import { BufferWriter, type PacketWriter } from "./support/buffer.js";
import { logBinary } from "./support/utils.js";

export type Packet =
	| SenderReport
	| ReceiverReport
	| SourceDescription
	| Goodbye
	| TransportLayerNack
	| RapidResynchronizationRequest
	| PictureLossIndication
	| SliceLossIndication
	| ReceiverEstimatedMaximumBitrate
	| RawPacket;

const decodeRaw: PacketDecoder<Packet> = (data) => RawPacket.unmarshal(data);

const TYPE_DECODERS: ReadonlyMap<number, PacketDecoder<Packet>> = new Map<
	number,
	PacketDecoder<Packet>
>([
	[PacketType.SenderReport, (data) => SenderReport.unmarshal(data)],
	[PacketType.ReceiverReport, (data) => ReceiverReport.unmarshal(data)],
	[
		PacketType.SourceDescription,
		(data) => SourceDescription.unmarshal(data),
	],
	[PacketType.Goodbye, (data) => Goodbye.unmarshal(data)],
]);

const FORMAT_DECODERS: ReadonlyMap<
	number,
	ReadonlyMap<number, PacketDecoder<Packet>>
> = new Map<number, ReadonlyMap<number, PacketDecoder<Packet>>>([
	[
		PacketType.TransportSpecificFeedback,
		new Map<number, PacketDecoder<Packet>>([
			[
				FeedbackFormat.TransportLayerNack,
				(data) => TransportLayerNack.unmarshal(data),
			],
			[
				FeedbackFormat.RapidResynchronizationRequest,
				(data) => RapidResynchronizationRequest.unmarshal(data),
			],
		]),
	],
	[
		PacketType.PayloadSpecificFeedback,
		new Map<number, PacketDecoder<Packet>>([
			[
				FeedbackFormat.PictureLossIndication,
				(data) => PictureLossIndication.unmarshal(data),
			],
			[
				FeedbackFormat.SliceLossIndication,
				(data) => SliceLossIndication.unmarshal(data),
			],
			[
				FeedbackFormat.ReceiverEstimatedMaximumBitrate,
				(data) => ReceiverEstimatedMaximumBitrate.unmarshal(data),
			],
		]),
	],
]);

/**
 * Decoder for a sub-packet with the given header fields. Never fails: pairs
 * without a dedicated decoder map to RawPacket.
 */
export function decoderFor(type: number, count: number): PacketDecoder<Packet> {
	const formats = FORMAT_DECODERS.get(type);
	if (formats !== undefined) {
		return formats.get(count) ?? decodeRaw;
	}
	return TYPE_DECODERS.get(type) ?? decodeRaw;
}

/**
 * Decode a whole datagram, compound or reduced-size, into its packets in wire
 * order. Any failure aborts the call; no partial result is returned.
 */
export function unmarshal(data: Buffer, options?: UnmarshalOptions): Packet[] {
	const settings = createUnmarshalSettings(options);
	const packets: Packet[] = [];

	let offset = 0;
	while (offset < data.length) {
		const remaining = data.length - offset;
		if (remaining < HEADER_LENGTH) {
			throw new PacketTooShortError(
				`${remaining} trailing bytes at offset ${offset}, header needs ${HEADER_LENGTH}`,
			);
		}

		const header = Header.decode(data.subarray(offset, offset + HEADER_LENGTH));
		if (
			settings.versionPolicy === VersionPolicy.Strict &&
			header.version !== RTP_VERSION
		) {
			throw new BadVersionError(
				`unsupported version ${header.version} at offset ${offset}`,
				header.version,
			);
		}

		const bytesProcessed = header.byteLength;
		if (bytesProcessed > remaining) {
			throw new PacketTooShortError(
				`${packetTypeName(header.type)} at offset ${offset} declares ${bytesProcessed} bytes, ${remaining} left`,
			);
		}

		const slice = data.subarray(offset, offset + bytesProcessed);
		logBinary(settings.logger, "Decoding RTCP packet", {
			type: packetTypeName(header.type),
			count: header.count,
			offset,
			data: slice,
		});

		const packet = decoderFor(header.type, header.count)(slice);
		if (packet instanceof RawPacket) {
			logBinary(settings.logger, "No decoder, keeping raw packet", {
				type: header.type,
				count: header.count,
			});
		}
		packets.push(packet);
		offset += bytesProcessed;
	}

	if (packets.length === 0) {
		throw new InvalidHeaderError("no packets in empty buffer");
	}
	return packets;
}

/**
 * Write each packet's own serialization to `writer`, in order. Stops at the
 * first failing write; bytes already written stay written.
 */
export function marshalTo(packets: readonly RtcpPacket[], writer: PacketWriter): void {
	for (const packet of packets) {
		packet.marshalTo(writer);
	}
}

export function marshal(packets: readonly RtcpPacket[]): Buffer {
	const writer = new BufferWriter();
	marshalTo(packets, writer);
	return writer.toBuffer();
}

/** Destination SSRCs of all packets, concatenated in packet order. */
export function destinationSsrcs(packets: readonly RtcpPacket[]): number[] {
	return packets.flatMap((packet) => packet.destinationSsrc());
}
