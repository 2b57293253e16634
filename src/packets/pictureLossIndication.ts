import { FeedbackFormat, PacketType } from "../const.js";
import { BasePacket, openPacket } from "./base.js";
import { type FeedbackInit, FeedbackSsrcs } from "./feedback.js";

/** Picture loss indication, RFC 4585 section 6.3.1. */
export class PictureLossIndication extends BasePacket {
	protected readonly packetType = PacketType.PayloadSpecificFeedback;

	readonly senderSsrc: number;
	readonly mediaSsrc: number;

	constructor(init: FeedbackInit) {
		super();
		this.senderSsrc = init.senderSsrc;
		this.mediaSsrc = init.mediaSsrc;
	}

	static unmarshal(data: Buffer): PictureLossIndication {
		const { body } = openPacket(
			data,
			PacketType.PayloadSpecificFeedback,
			FeedbackFormat.PictureLossIndication,
		);
		return new PictureLossIndication(FeedbackSsrcs.decode(body));
	}

	destinationSsrc(): number[] {
		return [this.mediaSsrc];
	}

	protected headerCount(): number {
		return FeedbackFormat.PictureLossIndication;
	}

	protected encodeBody(): Buffer {
		return FeedbackSsrcs.encode(this);
	}
}
