import { HEADER_LENGTH } from "../const.js";
import { Header } from "../header.js";
import type { PacketWriter } from "../support/buffer.js";
import type { RtcpPacket } from "./base.js";

/**
 * Packet of a type or feedback format without a dedicated decoder. Keeps the
 * sub-packet bytes verbatim, header included, so it marshals back unchanged.
 */
export class RawPacket implements RtcpPacket {
	private readonly _data: Buffer;

	constructor(data: Buffer) {
		Header.decode(data);
		this._data = Buffer.from(data);
	}

	static unmarshal(data: Buffer): RawPacket {
		return new RawPacket(data);
	}

	/** Copy of the packet bytes. */
	get data(): Buffer {
		return Buffer.from(this._data);
	}

	header(): Header {
		return Header.decode(this._data);
	}

	/** Bytes following the four header bytes, padding included. */
	body(): Buffer {
		return Buffer.from(this._data.subarray(HEADER_LENGTH));
	}

	destinationSsrc(): number[] {
		return [];
	}

	marshalSize(): number {
		return this._data.length;
	}

	marshal(): Buffer {
		return Buffer.from(this._data);
	}

	marshalTo(writer: PacketWriter): void {
		writer.write(this.marshal());
	}
}
