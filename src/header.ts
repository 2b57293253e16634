/**
 * Fixed 4-byte header shared by every RTCP packet (RFC 3550 section 6.4.1).
 *
 *  0                   1                   2                   3
 *  0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1
 * +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 * |V=2|P|  Count  |      PT       |             length            |
 * +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 */

import {
	COUNT_MAX,
	HEADER_LENGTH,
	LENGTH_MAX,
	packetTypeName,
	RTP_VERSION,
} from "./const.js";
import { InvalidFieldError, PacketTooShortError } from "./exceptions.js";

export interface HeaderFields {
	version?: number;
	padding?: boolean;
	count: number;
	type: number;
	length: number;
}

export class Header {
	readonly version: number;
	readonly padding: boolean;
	/** Reception report count, or feedback message type for RTPFB/PSFB. */
	readonly count: number;
	/** One of PacketType, or any other 8-bit code. */
	readonly type: number;
	/** Packet length in 32-bit words minus one. */
	readonly length: number;

	constructor(fields: HeaderFields) {
		this.version = fields.version ?? RTP_VERSION;
		this.padding = fields.padding ?? false;
		this.count = fields.count;
		this.type = fields.type;
		this.length = fields.length;
	}

	/** Total size in bytes of the packet this header introduces. */
	get byteLength(): number {
		return (this.length + 1) * 4;
	}

	/** Decode the first four bytes of `data`; the declared length is not checked. */
	static decode(data: Buffer): Header {
		if (data.length < HEADER_LENGTH) {
			throw new PacketTooShortError(
				`header needs ${HEADER_LENGTH} bytes, got ${data.length}`,
			);
		}
		return new Header({
			version: data[0] >> 6,
			padding: ((data[0] >> 5) & 0x01) === 1,
			count: data[0] & COUNT_MAX,
			type: data[1],
			length: data.readUInt16BE(2),
		});
	}

	encode(): Buffer {
		if (!Number.isInteger(this.version) || this.version < 0 || this.version > 3) {
			throw new InvalidFieldError(`invalid version ${this.version}`);
		}
		if (!Number.isInteger(this.count) || this.count < 0 || this.count > COUNT_MAX) {
			throw new InvalidFieldError(`invalid count ${this.count}`);
		}
		if (!Number.isInteger(this.type) || this.type < 0 || this.type > 0xff) {
			throw new InvalidFieldError(`invalid packet type ${this.type}`);
		}
		if (!Number.isInteger(this.length) || this.length < 0 || this.length > LENGTH_MAX) {
			throw new InvalidFieldError(`invalid length ${this.length}`);
		}

		const buf = Buffer.alloc(HEADER_LENGTH);
		buf[0] = (this.version << 6) | (this.padding ? 0x20 : 0) | this.count;
		buf[1] = this.type;
		buf.writeUInt16BE(this.length, 2);
		return buf;
	}

	toString(): string {
		return `Header(type=${packetTypeName(this.type)}, count=${this.count}, length=${this.length}, padding=${this.padding}, version=${this.version})`;
	}
}

/** Header for a packet of `byteLength` bytes, which must be a multiple of four. */
export function headerFor(
	type: number,
	count: number,
	byteLength: number,
	padding = false,
): Header {
	if (byteLength % 4 !== 0) {
		throw new InvalidFieldError(`packet size ${byteLength} is not word aligned`);
	}
	return new Header({ type, count, padding, length: byteLength / 4 - 1 });
}
