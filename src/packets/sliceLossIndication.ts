import { FeedbackFormat, PacketType } from "../const.js";
import { InvalidFieldError } from "../exceptions.js";
import { BasePacket, openPacket } from "./base.js";
import { type FeedbackInit, FeedbackSsrcs, feedbackEntryCount } from "./feedback.js";

const ENTRY_LENGTH = 4;

export interface SliEntry {
	/** Address of the first lost macroblock (13 bit). */
	first: number;
	/** Number of lost macroblocks (13 bit). */
	number: number;
	/** Six least significant bits of the picture ID (6 bit). */
	picture: number;
}

export interface SliceLossIndicationInit extends FeedbackInit {
	entries?: SliEntry[];
}

function checkBits(value: number, bits: number, name: string): number {
	if (!Number.isInteger(value) || value < 0 || value >= 2 ** bits) {
		throw new InvalidFieldError(`SLI ${name}=${value} does not fit in ${bits} bits`);
	}
	return value;
}

/** Slice loss indication, RFC 4585 section 6.3.2. */
export class SliceLossIndication extends BasePacket {
	protected readonly packetType = PacketType.PayloadSpecificFeedback;

	readonly senderSsrc: number;
	readonly mediaSsrc: number;
	readonly entries: SliEntry[];

	constructor(init: SliceLossIndicationInit) {
		super();
		this.senderSsrc = init.senderSsrc;
		this.mediaSsrc = init.mediaSsrc;
		this.entries = init.entries ?? [];
	}

	static unmarshal(data: Buffer): SliceLossIndication {
		const { body } = openPacket(
			data,
			PacketType.PayloadSpecificFeedback,
			FeedbackFormat.SliceLossIndication,
		);
		const count = feedbackEntryCount(body, ENTRY_LENGTH, "SLI");

		const entries: SliEntry[] = [];
		for (let i = 0; i < count; i++) {
			const value = body.readUInt32BE(FeedbackSsrcs.length + i * ENTRY_LENGTH);
			entries.push({
				first: value >>> 19,
				number: (value >>> 6) & 0x1fff,
				picture: value & 0x3f,
			});
		}
		return new SliceLossIndication({
			...FeedbackSsrcs.decode(body, true),
			entries,
		});
	}

	destinationSsrc(): number[] {
		return [this.mediaSsrc];
	}

	protected headerCount(): number {
		return FeedbackFormat.SliceLossIndication;
	}

	protected encodeBody(): Buffer {
		const entries = Buffer.alloc(this.entries.length * ENTRY_LENGTH);
		this.entries.forEach((entry, i) => {
			const value =
				checkBits(entry.first, 13, "first") * 2 ** 19 +
				(checkBits(entry.number, 13, "number") << 6) +
				checkBits(entry.picture, 6, "picture");
			entries.writeUInt32BE(value, i * ENTRY_LENGTH);
		});
		return Buffer.concat([FeedbackSsrcs.encode(this), entries]);
	}
}
