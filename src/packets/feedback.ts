/**
 * Common part of feedback messages (RFC 4585 section 6.1): the header is
 * followed by the packet sender's SSRC and the media source's SSRC.
 */

import { MalformedPacketError } from "../exceptions.js";
import { defpacket } from "../support/packet.js";

export const FeedbackSsrcs = defpacket("FeedbackSsrcs", {
	senderSsrc: "I",
	mediaSsrc: "I",
});

export interface FeedbackInit {
	senderSsrc: number;
	mediaSsrc: number;
}

/**
 * Check that a feedback body holds the common part followed by whole
 * `entryLength`-byte entries, and return the number of entries.
 */
export function feedbackEntryCount(
	body: Buffer,
	entryLength: number,
	name: string,
): number {
	const entriesLength = body.length - FeedbackSsrcs.length;
	if (entriesLength < 0) {
		throw new MalformedPacketError(
			`${name} needs ${FeedbackSsrcs.length} bytes of body, got ${body.length}`,
		);
	}
	if (entriesLength % entryLength !== 0) {
		throw new MalformedPacketError(
			`${name} has ${entriesLength} bytes of entries, not a multiple of ${entryLength}`,
		);
	}
	return entriesLength / entryLength;
}
