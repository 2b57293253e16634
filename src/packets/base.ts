import { COUNT_MAX, HEADER_LENGTH, packetTypeName } from "../const.js";
import {
	InvalidFieldError,
	MalformedPacketError,
	WrongPacketTypeError,
} from "../exceptions.js";
import { Header, headerFor } from "../header.js";
import type { PacketWriter } from "../support/buffer.js";
import { padBody, stripPadding } from "../support/utils.js";

/** Capability shared by every RTCP packet kind, including the raw fallback. */
export interface RtcpPacket {
	/** Header this packet marshals with. */
	header(): Header;
	/** SSRCs this packet refers to, in the order they appear in the body. */
	destinationSsrc(): number[];
	marshalSize(): number;
	marshal(): Buffer;
	marshalTo(writer: PacketWriter): void;
}

export type PacketDecoder<P extends RtcpPacket = RtcpPacket> = (
	data: Buffer,
) => P;

export abstract class BasePacket implements RtcpPacket {
	protected abstract readonly packetType: number;

	/** Value for the header's count/format field. */
	protected abstract headerCount(): number;

	/** Body following the header, before padding. */
	protected abstract encodeBody(): Buffer;

	abstract destinationSsrc(): number[];

	header(): Header {
		return this.frame()[0];
	}

	marshalSize(): number {
		const [header] = this.frame();
		return header.byteLength;
	}

	marshal(): Buffer {
		const [header, body] = this.frame();
		return Buffer.concat([header.encode(), body]);
	}

	marshalTo(writer: PacketWriter): void {
		writer.write(this.marshal());
	}

	private frame(): [Header, Buffer] {
		const [body, padding] = padBody(this.encodeBody(), HEADER_LENGTH);
		const header = headerFor(
			this.packetType,
			this.headerCount(),
			HEADER_LENGTH + body.length,
			padding,
		);
		return [header, body];
	}
}

export function checkCount(count: number, what: string): number {
	if (count > COUNT_MAX) {
		throw new InvalidFieldError(
			`${count} ${what} exceed the maximum of ${COUNT_MAX}`,
		);
	}
	return count;
}

export interface OpenedPacket {
	header: Header;
	/** Body after the header, with any padding removed. */
	body: Buffer;
}

/**
 * Check that `data` is one complete packet of the expected type (and feedback
 * format, when given) and split it into header and unpadded body.
 */
export function openPacket(
	data: Buffer,
	type: number,
	format?: number,
): OpenedPacket {
	const header = Header.decode(data);
	if (header.type !== type) {
		throw new WrongPacketTypeError(
			`expected ${packetTypeName(type)}, got ${packetTypeName(header.type)}`,
		);
	}
	if (format !== undefined && header.count !== format) {
		throw new WrongPacketTypeError(
			`expected format ${format} of ${packetTypeName(type)}, got ${header.count}`,
		);
	}
	if (header.byteLength !== data.length) {
		throw new MalformedPacketError(
			`length field declares ${header.byteLength} bytes, got ${data.length}`,
		);
	}
	const body = stripPadding(data, header.padding, HEADER_LENGTH).subarray(
		HEADER_LENGTH,
	);
	return { header, body };
}

export function readSsrcList(data: Buffer, offset: number, count: number): number[] {
	const ssrcs: number[] = [];
	for (let i = 0; i < count; i++) {
		ssrcs.push(data.readUInt32BE(offset + i * 4));
	}
	return ssrcs;
}

export function writeSsrcList(ssrcs: number[]): Buffer {
	const buf = Buffer.alloc(ssrcs.length * 4);
	ssrcs.forEach((ssrc, i) => {
		if (!Number.isInteger(ssrc) || ssrc < 0 || ssrc > 0xffffffff) {
			throw new InvalidFieldError(`invalid SSRC ${ssrc}`);
		}
		buf.writeUInt32BE(ssrc, i * 4);
	});
	return buf;
}
