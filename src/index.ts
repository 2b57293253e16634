export * from "./compound.js";
export * from "./const.js";
export * from "./exceptions.js";
export { Header, type HeaderFields, headerFor } from "./header.js";
export {
	decoderFor,
	destinationSsrcs,
	marshal,
	marshalTo,
	type Packet,
	unmarshal,
} from "./packet.js";
export * from "./packets/index.js";
export * from "./settings.js";
export * from "./support/index.js";
