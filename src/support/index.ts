export { BufferWriter, type PacketWriter } from "./buffer.js";
export {
	defpacket,
	type FieldFormat,
	type FieldLayout,
	type Fields,
	type PacketLayout,
} from "./packet.js";
export {
	DEBUG,
	decodeText,
	type Logger,
	logBinary,
	NULL_LOGGER,
	padBody,
	paddingFor,
	stripPadding,
} from "./utils.js";
