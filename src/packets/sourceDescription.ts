import { PacketType, SdesType, SSRC_LENGTH } from "../const.js";
import { InvalidFieldError, MalformedPacketError } from "../exceptions.js";
import { decodeText, paddingFor } from "../support/utils.js";
import { BasePacket, checkCount, openPacket, writeSsrcList } from "./base.js";

const ITEM_HEADER_LENGTH = 2;
const ITEM_TEXT_MAX = 0xff;

export interface SourceDescriptionItem {
	type: SdesType;
	text: string;
}

export interface SourceDescriptionChunk {
	source: number;
	items: SourceDescriptionItem[];
}

function encodeItem(item: SourceDescriptionItem): Buffer {
	if (item.type === SdesType.End || item.type < 0 || item.type > 0xff) {
		throw new InvalidFieldError(`invalid SDES item type ${item.type}`);
	}
	const text = Buffer.from(item.text, "utf8");
	if (text.length > ITEM_TEXT_MAX) {
		throw new InvalidFieldError(
			`SDES item text is ${text.length} bytes, maximum is ${ITEM_TEXT_MAX}`,
		);
	}
	return Buffer.concat([Buffer.from([item.type, text.length]), text]);
}

function encodeChunk(chunk: SourceDescriptionChunk): Buffer {
	const parts = [writeSsrcList([chunk.source]), ...chunk.items.map(encodeItem)];
	const length = parts.reduce((sum, part) => sum + part.length, 0);
	// Null item, then zeros up to the next 32-bit boundary
	parts.push(Buffer.alloc(1 + paddingFor(length + 1)));
	return Buffer.concat(parts);
}

/** Decode the chunk starting at `offset`; returns it and the offset of the next one. */
function decodeChunk(
	body: Buffer,
	offset: number,
): [SourceDescriptionChunk, number] {
	if (offset + SSRC_LENGTH > body.length) {
		throw new MalformedPacketError("SDES chunk too short for source");
	}
	const source = body.readUInt32BE(offset);
	const items: SourceDescriptionItem[] = [];

	let i = offset + SSRC_LENGTH;
	for (;;) {
		if (i >= body.length) {
			throw new MalformedPacketError("SDES chunk is missing its terminator");
		}
		const type = body[i];
		if (type === SdesType.End) {
			const end = i + 1 + paddingFor(i + 1 - offset);
			if (end > body.length) {
				throw new MalformedPacketError("SDES chunk padding is truncated");
			}
			return [{ source, items }, end];
		}
		if (i + ITEM_HEADER_LENGTH > body.length) {
			throw new MalformedPacketError("SDES item header is truncated");
		}
		const textLength = body[i + 1];
		const textStart = i + ITEM_HEADER_LENGTH;
		if (textStart + textLength > body.length) {
			throw new MalformedPacketError(
				`SDES item declares ${textLength} bytes, ${body.length - textStart} left`,
			);
		}
		items.push({
			type,
			text: decodeText(body, textStart, textStart + textLength, "SDES item text"),
		});
		i = textStart + textLength;
	}
}

/** Source description, RFC 3550 section 6.5. */
export class SourceDescription extends BasePacket {
	protected readonly packetType = PacketType.SourceDescription;

	readonly chunks: SourceDescriptionChunk[];

	constructor(chunks: SourceDescriptionChunk[] = []) {
		super();
		this.chunks = chunks;
	}

	static unmarshal(data: Buffer): SourceDescription {
		const { header, body } = openPacket(data, PacketType.SourceDescription);

		const chunks: SourceDescriptionChunk[] = [];
		let offset = 0;
		while (offset < body.length) {
			const [chunk, next] = decodeChunk(body, offset);
			chunks.push(chunk);
			offset = next;
		}

		if (chunks.length !== header.count) {
			throw new MalformedPacketError(
				`header declares ${header.count} chunks, found ${chunks.length}`,
			);
		}
		return new SourceDescription(chunks);
	}

	destinationSsrc(): number[] {
		return this.chunks.map((chunk) => chunk.source);
	}

	protected headerCount(): number {
		return checkCount(this.chunks.length, "chunks");
	}

	protected encodeBody(): Buffer {
		return Buffer.concat(this.chunks.map(encodeChunk));
	}
}
