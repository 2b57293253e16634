import { FeedbackFormat, PacketType } from "../const.js";
import { defpacket } from "../support/packet.js";
import { BasePacket, openPacket } from "./base.js";
import { type FeedbackInit, FeedbackSsrcs, feedbackEntryCount } from "./feedback.js";

const NackPairLayout = defpacket("NackPair", {
	packetId: "H",
	lostPackets: "H",
});

export interface NackPair {
	/** First lost sequence number. */
	packetId: number;
	/** Bitmask of the following 16 sequence numbers that were also lost. */
	lostPackets: number;
}

export interface TransportLayerNackInit extends FeedbackInit {
	nacks?: NackPair[];
}

/** Sequence numbers covered by a NACK pair, in ascending order. */
export function nackPairPackets(pair: NackPair): number[] {
	const packets = [pair.packetId];
	for (let bit = 0; bit < 16; bit++) {
		if ((pair.lostPackets >> bit) & 1) {
			packets.push((pair.packetId + bit + 1) & 0xffff);
		}
	}
	return packets;
}

/** Group sorted sequence numbers into as few NACK pairs as possible. */
export function nackPairsFromSequenceNumbers(sequenceNumbers: number[]): NackPair[] {
	const pairs: NackPair[] = [];
	let current: NackPair | undefined;
	for (const seq of sequenceNumbers) {
		if (current === undefined) {
			current = { packetId: seq, lostPackets: 0 };
			continue;
		}
		const distance = (seq - current.packetId) & 0xffff;
		if (distance === 0) continue;
		if (distance > 16) {
			pairs.push(current);
			current = { packetId: seq, lostPackets: 0 };
			continue;
		}
		current.lostPackets |= 1 << (distance - 1);
	}
	if (current !== undefined) pairs.push(current);
	return pairs;
}

/** Generic NACK, RFC 4585 section 6.2.1. */
export class TransportLayerNack extends BasePacket {
	protected readonly packetType = PacketType.TransportSpecificFeedback;

	readonly senderSsrc: number;
	readonly mediaSsrc: number;
	readonly nacks: NackPair[];

	constructor(init: TransportLayerNackInit) {
		super();
		this.senderSsrc = init.senderSsrc;
		this.mediaSsrc = init.mediaSsrc;
		this.nacks = init.nacks ?? [];
	}

	static unmarshal(data: Buffer): TransportLayerNack {
		const { body } = openPacket(
			data,
			PacketType.TransportSpecificFeedback,
			FeedbackFormat.TransportLayerNack,
		);
		const count = feedbackEntryCount(body, NackPairLayout.length, "NACK");

		const nacks: NackPair[] = [];
		for (let i = 0; i < count; i++) {
			const offset = FeedbackSsrcs.length + i * NackPairLayout.length;
			nacks.push(NackPairLayout.decode(body.subarray(offset), true));
		}
		return new TransportLayerNack({
			...FeedbackSsrcs.decode(body, true),
			nacks,
		});
	}

	/** Every sequence number reported lost. */
	packetList(): number[] {
		return this.nacks.flatMap(nackPairPackets);
	}

	destinationSsrc(): number[] {
		return [this.mediaSsrc];
	}

	protected headerCount(): number {
		return FeedbackFormat.TransportLayerNack;
	}

	protected encodeBody(): Buffer {
		return Buffer.concat([
			FeedbackSsrcs.encode(this),
			...this.nacks.map((nack) => NackPairLayout.encode(nack)),
		]);
	}
}
