import { PacketType, SSRC_LENGTH } from "../const.js";
import { MalformedPacketError } from "../exceptions.js";
import { BasePacket, checkCount, openPacket, writeSsrcList } from "./base.js";
import {
	decodeReports,
	RECEPTION_REPORT_LENGTH,
	type ReceptionReport,
} from "./receptionReport.js";

export interface ReceiverReportInit {
	ssrc: number;
	reports?: ReceptionReport[];
	profileExtensions?: Buffer;
}

/** Receiver report, RFC 3550 section 6.4.2. */
export class ReceiverReport extends BasePacket {
	protected readonly packetType = PacketType.ReceiverReport;

	/** SSRC of the packet sender. */
	readonly ssrc: number;
	readonly reports: ReceptionReport[];
	readonly profileExtensions: Buffer;

	constructor(init: ReceiverReportInit) {
		super();
		this.ssrc = init.ssrc;
		this.reports = init.reports ?? [];
		this.profileExtensions = init.profileExtensions ?? Buffer.alloc(0);
	}

	static unmarshal(data: Buffer): ReceiverReport {
		const { header, body } = openPacket(data, PacketType.ReceiverReport);
		const fixedLength = SSRC_LENGTH + header.count * RECEPTION_REPORT_LENGTH;
		if (body.length < fixedLength) {
			throw new MalformedPacketError(
				`receiver report with ${header.count} reports needs ${fixedLength} bytes of body, got ${body.length}`,
			);
		}

		return new ReceiverReport({
			ssrc: body.readUInt32BE(0),
			reports: decodeReports(body.subarray(SSRC_LENGTH), header.count),
			profileExtensions: Buffer.from(body.subarray(fixedLength)),
		});
	}

	destinationSsrc(): number[] {
		return this.reports.map((report) => report.ssrc);
	}

	protected headerCount(): number {
		return checkCount(this.reports.length, "reception reports");
	}

	protected encodeBody(): Buffer {
		return Buffer.concat([
			writeSsrcList([this.ssrc]),
			...this.reports.map((report) => report.encode()),
			this.profileExtensions,
		]);
	}
}
