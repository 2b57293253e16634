import { FeedbackFormat, PacketType } from "../const.js";
import { BasePacket, openPacket } from "./base.js";
import { type FeedbackInit, FeedbackSsrcs } from "./feedback.js";

/** Rapid resynchronisation request, RFC 6051 section 7. */
export class RapidResynchronizationRequest extends BasePacket {
	protected readonly packetType = PacketType.TransportSpecificFeedback;

	readonly senderSsrc: number;
	readonly mediaSsrc: number;

	constructor(init: FeedbackInit) {
		super();
		this.senderSsrc = init.senderSsrc;
		this.mediaSsrc = init.mediaSsrc;
	}

	static unmarshal(data: Buffer): RapidResynchronizationRequest {
		const { body } = openPacket(
			data,
			PacketType.TransportSpecificFeedback,
			FeedbackFormat.RapidResynchronizationRequest,
		);
		return new RapidResynchronizationRequest(FeedbackSsrcs.decode(body));
	}

	destinationSsrc(): number[] {
		return [this.mediaSsrc];
	}

	protected headerCount(): number {
		return FeedbackFormat.RapidResynchronizationRequest;
	}

	protected encodeBody(): Buffer {
		return FeedbackSsrcs.encode(this);
	}
}
