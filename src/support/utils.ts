import { InvalidPaddingError, MalformedPacketError } from "../exceptions.js";

const BINARY_LINE_LENGTH = 512;

export interface Logger {
	isEnabledFor?(level: number): boolean;
	debug(...args: unknown[]): void;
}

export const DEBUG = 10;

export const NULL_LOGGER: Logger = {
	isEnabledFor: () => false,
	debug: (..._args: unknown[]) => {},
};

function shorten(text: string, length: number): string {
	return text.length < length ? text : `${text.slice(0, length - 3)}...`;
}

function logValue(value: unknown): string {
	if (value === null || value === undefined) return "";
	if (Buffer.isBuffer(value)) {
		return value.toString("hex");
	}
	return String(value);
}

export function logBinary(
	logger: Logger,
	message: string,
	kwargs: Record<string, unknown> = {},
	level = DEBUG,
): void {
	if (logger.isEnabledFor && !logger.isEnabledFor(level)) return;

	const overrideLength = Number.parseInt(
		process.env.RTCP_BINARY_MAX_LINE ?? "0",
		10,
	);
	const lineLength = overrideLength || BINARY_LINE_LENGTH;

	const parts = Object.keys(kwargs)
		.sort()
		.map((k) => `${k}=${shorten(logValue(kwargs[k]), lineLength)}`);

	logger.debug("%s (%s)", message, parts.join(", "));
}

/** Number of zero bytes needed to bring `length` to a 32-bit boundary. */
export function paddingFor(length: number): number {
	return (4 - (length % 4)) % 4;
}

/**
 * Remove RTCP padding from a sub-packet whose header has the padding bit set.
 * The last byte holds the pad count, which includes itself.
 */
export function stripPadding(
	data: Buffer,
	padding: boolean,
	headerLength: number,
): Buffer {
	if (!padding) return data;
	if (data.length <= headerLength) {
		throw new InvalidPaddingError("padding bit set on empty body");
	}
	const count = data[data.length - 1];
	if (count === 0 || count > data.length - headerLength) {
		throw new InvalidPaddingError(`invalid pad count ${count}`);
	}
	return data.subarray(0, data.length - count);
}

/** Append RTCP padding so that `header + body` ends on a 32-bit boundary. */
export function padBody(body: Buffer, headerLength: number): [Buffer, boolean] {
	const count = paddingFor(headerLength + body.length);
	if (count === 0) return [body, false];
	const pad = Buffer.alloc(count);
	pad[count - 1] = count;
	return [Buffer.concat([body, pad]), true];
}

const UTF8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/** Decode `data[start, end)` as UTF-8; invalid sequences are an error, not U+FFFD. */
export function decodeText(
	data: Buffer,
	start: number,
	end: number,
	what: string,
): string {
	try {
		return UTF8.decode(data.subarray(start, end));
	} catch (ex) {
		if (ex instanceof TypeError) {
			throw new MalformedPacketError(`${what} is not valid UTF-8`);
		}
		throw ex;
	}
}
