/**
 * Rules for regular compound packets (RFC 3550 section 6.1): a report comes
 * first, optionally followed by more receiver reports, then a source
 * description that carries a CNAME.
 */

import { SdesType } from "./const.js";
import {
	BadFirstPacketError,
	EmptyCompoundError,
	MissingCnameError,
	PacketBeforeCnameError,
} from "./exceptions.js";
import type { RtcpPacket } from "./packets/base.js";
import { ReceiverReport } from "./packets/receiverReport.js";
import { SenderReport } from "./packets/senderReport.js";
import { SourceDescription } from "./packets/sourceDescription.js";

function findCname(sdes: SourceDescription): string | undefined {
	for (const chunk of sdes.chunks) {
		for (const item of chunk.items) {
			if (item.type === SdesType.Cname) return item.text;
		}
	}
	return undefined;
}

/** Return the compound's source description after checking the ordering rules. */
function cnameSource(packets: readonly RtcpPacket[]): SourceDescription {
	if (packets.length === 0) {
		throw new EmptyCompoundError("compound packet is empty");
	}

	const [first, ...rest] = packets;
	if (!(first instanceof SenderReport || first instanceof ReceiverReport)) {
		throw new BadFirstPacketError(
			"compound packet must start with a sender or receiver report",
		);
	}

	for (const packet of rest) {
		if (packet instanceof ReceiverReport) continue;
		if (packet instanceof SourceDescription) {
			if (findCname(packet) === undefined) {
				throw new MissingCnameError("source description has no CNAME");
			}
			return packet;
		}
		throw new PacketBeforeCnameError(
			"only receiver reports may precede the source description",
		);
	}
	throw new MissingCnameError("compound packet has no source description");
}

export function validateCompound(packets: readonly RtcpPacket[]): void {
	cnameSource(packets);
}

/** CNAME announced by a valid compound packet. */
export function compoundCname(packets: readonly RtcpPacket[]): string {
	const cname = findCname(cnameSource(packets));
	if (cname === undefined) {
		throw new MissingCnameError("source description has no CNAME");
	}
	return cname;
}
