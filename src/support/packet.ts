import { InvalidFieldError, MalformedPacketError } from "../exceptions.js";

const FORMAT_SIZES = {
	B: 1,
	H: 2,
	T: 3,
	I: 4,
	Q: 8,
} as const;

export type FieldFormat = keyof typeof FORMAT_SIZES;

type FieldValue<F extends FieldFormat> = F extends "Q" ? bigint : number;

export type FieldLayout = Record<string, FieldFormat>;

export type Fields<L extends FieldLayout> = {
	[K in keyof L]: FieldValue<L[K]>;
};

export interface PacketLayout<L extends FieldLayout> {
	readonly name: string;
	readonly length: number;
	decode(data: Buffer, allowExcessive?: boolean): Fields<L>;
	encode(values: Fields<L>): Buffer;
	extend<E extends FieldLayout>(
		extName: string,
		extFields: E,
	): PacketLayout<L & E>;
}

const UNSIGNED_MAX: Record<Exclude<FieldFormat, "Q">, number> = {
	B: 0xff,
	H: 0xffff,
	T: 0xffffff,
	I: 0xffffffff,
};

function readField(buf: Buffer, offset: number, fmt: FieldFormat): number | bigint {
	switch (fmt) {
		case "B":
			return buf.readUInt8(offset);
		case "H":
			return buf.readUInt16BE(offset);
		case "T":
			return buf.readUIntBE(offset, 3);
		case "I":
			return buf.readUInt32BE(offset);
		case "Q":
			return buf.readBigUInt64BE(offset);
	}
}

function writeField(
	buf: Buffer,
	offset: number,
	fmt: FieldFormat,
	name: string,
	value: number | bigint,
): void {
	if (fmt === "Q") {
		if (typeof value !== "bigint" || value < 0n || value > 0xffffffffffffffffn) {
			throw new InvalidFieldError(`${name} is not an unsigned 64-bit value`);
		}
		buf.writeBigUInt64BE(value, offset);
		return;
	}

	const max = UNSIGNED_MAX[fmt];
	if (
		typeof value !== "number" ||
		!Number.isInteger(value) ||
		value < 0 ||
		value > max
	) {
		throw new InvalidFieldError(`${name}=${value} does not fit in ${fmt}`);
	}
	buf.writeUIntBE(value, offset, FORMAT_SIZES[fmt]);
}

/**
 * Define a fixed-size, big-endian field layout.
 *
 * Fields are encoded in declaration order. Formats are B (8 bit), H (16 bit),
 * T (24 bit), I (32 bit) and Q (64 bit, decoded as bigint); all unsigned.
 */
export function defpacket<L extends FieldLayout>(
	name: string,
	fields: L,
): PacketLayout<L> {
	const fieldNames = Object.keys(fields);
	const totalLength = fieldNames.reduce(
		(sum, f) => sum + FORMAT_SIZES[fields[f]],
		0,
	);

	return {
		name,
		length: totalLength,

		decode(data: Buffer, allowExcessive = false): Fields<L> {
			if (data.length < totalLength) {
				throw new MalformedPacketError(
					`${name} needs ${totalLength} bytes, got ${data.length}`,
				);
			}
			if (!allowExcessive && data.length > totalLength) {
				throw new MalformedPacketError(
					`${name} is ${totalLength} bytes, got ${data.length}`,
				);
			}
			const result: Record<string, number | bigint> = {};
			let offset = 0;
			for (const field of fieldNames) {
				result[field] = readField(data, offset, fields[field]);
				offset += FORMAT_SIZES[fields[field]];
			}
			return result as Fields<L>;
		},

		encode(values: Fields<L>): Buffer {
			const record: Readonly<Record<string, number | bigint>> = values;
			const buf = Buffer.alloc(totalLength);
			let offset = 0;
			for (const field of fieldNames) {
				writeField(buf, offset, fields[field], field, record[field]);
				offset += FORMAT_SIZES[fields[field]];
			}
			return buf;
		},

		extend<E extends FieldLayout>(
			extName: string,
			extFields: E,
		): PacketLayout<L & E> {
			return defpacket(extName, { ...fields, ...extFields });
		},
	};
}
