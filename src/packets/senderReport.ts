import { PacketType } from "../const.js";
import { MalformedPacketError } from "../exceptions.js";
import { defpacket } from "../support/packet.js";
import { BasePacket, checkCount, openPacket } from "./base.js";
import {
	decodeReports,
	RECEPTION_REPORT_LENGTH,
	type ReceptionReport,
} from "./receptionReport.js";

const SenderInfo = defpacket("SenderInfo", {
	ssrc: "I",
	ntpTime: "Q",
	rtpTime: "I",
	packetCount: "I",
	octetCount: "I",
});

export interface SenderReportInit {
	ssrc: number;
	ntpTime: bigint;
	rtpTime: number;
	packetCount: number;
	octetCount: number;
	reports?: ReceptionReport[];
	profileExtensions?: Buffer;
}

/** Sender report, RFC 3550 section 6.4.1. */
export class SenderReport extends BasePacket {
	protected readonly packetType = PacketType.SenderReport;

	readonly ssrc: number;
	/** 64-bit NTP wallclock timestamp. */
	readonly ntpTime: bigint;
	/** RTP timestamp corresponding to ntpTime. */
	readonly rtpTime: number;
	readonly packetCount: number;
	readonly octetCount: number;
	readonly reports: ReceptionReport[];
	readonly profileExtensions: Buffer;

	constructor(init: SenderReportInit) {
		super();
		this.ssrc = init.ssrc;
		this.ntpTime = init.ntpTime;
		this.rtpTime = init.rtpTime;
		this.packetCount = init.packetCount;
		this.octetCount = init.octetCount;
		this.reports = init.reports ?? [];
		this.profileExtensions = init.profileExtensions ?? Buffer.alloc(0);
	}

	static unmarshal(data: Buffer): SenderReport {
		const { header, body } = openPacket(data, PacketType.SenderReport);
		const fixedLength = SenderInfo.length + header.count * RECEPTION_REPORT_LENGTH;
		if (body.length < fixedLength) {
			throw new MalformedPacketError(
				`sender report with ${header.count} reports needs ${fixedLength} bytes of body, got ${body.length}`,
			);
		}

		const info = SenderInfo.decode(body, true);
		return new SenderReport({
			...info,
			reports: decodeReports(body.subarray(SenderInfo.length), header.count),
			profileExtensions: Buffer.from(body.subarray(fixedLength)),
		});
	}

	destinationSsrc(): number[] {
		return [...this.reports.map((report) => report.ssrc), this.ssrc];
	}

	protected headerCount(): number {
		return checkCount(this.reports.length, "reception reports");
	}

	protected encodeBody(): Buffer {
		return Buffer.concat([
			SenderInfo.encode(this),
			...this.reports.map((report) => report.encode()),
			this.profileExtensions,
		]);
	}
}
