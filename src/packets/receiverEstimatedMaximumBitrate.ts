import { FeedbackFormat, PacketType } from "../const.js";
import { InvalidFieldError, MalformedPacketError } from "../exceptions.js";
import { defpacket } from "../support/packet.js";
import { BasePacket, openPacket, readSsrcList, writeSsrcList } from "./base.js";
import { FeedbackSsrcs } from "./feedback.js";

/** ASCII "REMB". */
const UNIQUE_IDENTIFIER = 0x52454d42;

const MANTISSA_BITS = 18;
const MANTISSA_MAX = 2 ** MANTISSA_BITS - 1;
const EXPONENT_MAX = 63;

/** Largest bitrate the 6-bit exponent and 18-bit mantissa can express. */
export const BITRATE_MAX = MANTISSA_MAX * 2 ** EXPONENT_MAX;

const RembFixed = FeedbackSsrcs.extend("RembFixed", {
	identifier: "I",
	ssrcCount: "B",
	bitrate: "T",
});

export interface ReceiverEstimatedMaximumBitrateInit {
	senderSsrc: number;
	/** Estimated total bitrate in bits per second. */
	bitrate: number;
	ssrcs?: number[];
}

function encodeBitrate(bitrate: number): number {
	if (Number.isNaN(bitrate) || bitrate < 0) {
		throw new InvalidFieldError(`invalid bitrate ${bitrate}`);
	}
	let mantissa = Math.min(bitrate, BITRATE_MAX);
	let exponent = 0;
	while (mantissa > MANTISSA_MAX) {
		mantissa /= 2;
		exponent++;
	}
	return exponent * 2 ** MANTISSA_BITS + Math.floor(mantissa);
}

function decodeBitrate(value: number): number {
	const exponent = value >>> MANTISSA_BITS;
	const mantissa = value & MANTISSA_MAX;
	return mantissa * 2 ** exponent;
}

/**
 * Receiver estimated maximum bitrate, draft-alvestrand-rmcat-remb. The media
 * source SSRC is always zero; the SSRCs the estimate applies to follow the
 * bitrate.
 */
export class ReceiverEstimatedMaximumBitrate extends BasePacket {
	protected readonly packetType = PacketType.PayloadSpecificFeedback;

	readonly senderSsrc: number;
	readonly bitrate: number;
	readonly ssrcs: number[];

	constructor(init: ReceiverEstimatedMaximumBitrateInit) {
		super();
		this.senderSsrc = init.senderSsrc;
		this.bitrate = init.bitrate;
		this.ssrcs = init.ssrcs ?? [];
	}

	static unmarshal(data: Buffer): ReceiverEstimatedMaximumBitrate {
		const { body } = openPacket(
			data,
			PacketType.PayloadSpecificFeedback,
			FeedbackFormat.ReceiverEstimatedMaximumBitrate,
		);
		const fixed = RembFixed.decode(body, true);
		if (fixed.identifier !== UNIQUE_IDENTIFIER) {
			throw new MalformedPacketError("missing REMB identifier");
		}
		if (fixed.mediaSsrc !== 0) {
			throw new MalformedPacketError(
				`REMB media source SSRC must be 0, got ${fixed.mediaSsrc}`,
			);
		}
		const expected = RembFixed.length + fixed.ssrcCount * 4;
		if (body.length !== expected) {
			throw new MalformedPacketError(
				`REMB declares ${fixed.ssrcCount} SSRCs, body is ${body.length} bytes`,
			);
		}

		return new ReceiverEstimatedMaximumBitrate({
			senderSsrc: fixed.senderSsrc,
			bitrate: decodeBitrate(fixed.bitrate),
			ssrcs: readSsrcList(body, RembFixed.length, fixed.ssrcCount),
		});
	}

	destinationSsrc(): number[] {
		return [...this.ssrcs];
	}

	protected headerCount(): number {
		return FeedbackFormat.ReceiverEstimatedMaximumBitrate;
	}

	protected encodeBody(): Buffer {
		if (this.ssrcs.length > 0xff) {
			throw new InvalidFieldError(`${this.ssrcs.length} SSRCs do not fit in REMB`);
		}
		return Buffer.concat([
			RembFixed.encode({
				senderSsrc: this.senderSsrc,
				mediaSsrc: 0,
				identifier: UNIQUE_IDENTIFIER,
				ssrcCount: this.ssrcs.length,
				bitrate: encodeBitrate(this.bitrate),
			}),
			writeSsrcList(this.ssrcs),
		]);
	}
}
