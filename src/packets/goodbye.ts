import { PacketType, SSRC_LENGTH } from "../const.js";
import { InvalidFieldError, MalformedPacketError } from "../exceptions.js";
import { decodeText, paddingFor } from "../support/utils.js";
import {
	BasePacket,
	checkCount,
	openPacket,
	readSsrcList,
	writeSsrcList,
} from "./base.js";

const REASON_MAX = 0xff;

/** Goodbye (BYE), RFC 3550 section 6.6. */
export class Goodbye extends BasePacket {
	protected readonly packetType = PacketType.Goodbye;

	readonly sources: number[];
	/** Reason for leaving; empty when the packet carries none. */
	readonly reason: string;

	constructor(sources: number[] = [], reason = "") {
		super();
		this.sources = sources;
		this.reason = reason;
	}

	static unmarshal(data: Buffer): Goodbye {
		const { header, body } = openPacket(data, PacketType.Goodbye);
		const sourcesLength = header.count * SSRC_LENGTH;
		if (body.length < sourcesLength) {
			throw new MalformedPacketError(
				`goodbye with ${header.count} sources needs ${sourcesLength} bytes of body, got ${body.length}`,
			);
		}

		const sources = readSsrcList(body, 0, header.count);
		let reason = "";
		if (body.length > sourcesLength) {
			const reasonLength = body[sourcesLength];
			const reasonStart = sourcesLength + 1;
			if (reasonStart + reasonLength > body.length) {
				throw new MalformedPacketError(
					`goodbye reason declares ${reasonLength} bytes, ${body.length - reasonStart} left`,
				);
			}
			reason = decodeText(
				body,
				reasonStart,
				reasonStart + reasonLength,
				"goodbye reason",
			);
		}
		return new Goodbye(sources, reason);
	}

	destinationSsrc(): number[] {
		return [...this.sources];
	}

	protected headerCount(): number {
		return checkCount(this.sources.length, "sources");
	}

	protected encodeBody(): Buffer {
		const sources = writeSsrcList(this.sources);
		if (this.reason === "") return sources;

		const reason = Buffer.from(this.reason, "utf8");
		if (reason.length > REASON_MAX) {
			throw new InvalidFieldError(
				`goodbye reason is ${reason.length} bytes, maximum is ${REASON_MAX}`,
			);
		}
		// Reason is zero padded to a word boundary, without the padding bit
		return Buffer.concat([
			sources,
			Buffer.from([reason.length]),
			reason,
			Buffer.alloc(paddingFor(1 + reason.length)),
		]);
	}
}
