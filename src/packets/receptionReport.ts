import { defpacket, type Fields } from "../support/packet.js";

const REPORT_FIELDS = {
	ssrc: "I",
	fractionLost: "B",
	totalLost: "T",
	lastSequenceNumber: "I",
	jitter: "I",
	lastSenderReport: "I",
	delay: "I",
} as const;

const ReceptionReportLayout = defpacket("ReceptionReport", REPORT_FIELDS);

export const RECEPTION_REPORT_LENGTH = ReceptionReportLayout.length;

export type ReceptionReportInit = Fields<typeof REPORT_FIELDS>;

/** Reception report block carried by sender and receiver reports. */
export class ReceptionReport {
	/** SSRC of the source this report is about. */
	readonly ssrc: number;
	/** Fraction of packets lost since the previous report, in 1/256 units. */
	readonly fractionLost: number;
	/** Cumulative number of packets lost (24 bit). */
	readonly totalLost: number;
	/** Extended highest sequence number received. */
	readonly lastSequenceNumber: number;
	readonly jitter: number;
	/** Middle 32 bits of the NTP timestamp of the last sender report. */
	readonly lastSenderReport: number;
	/** Delay since the last sender report, in 1/65536 seconds. */
	readonly delay: number;

	constructor(init: ReceptionReportInit) {
		this.ssrc = init.ssrc;
		this.fractionLost = init.fractionLost;
		this.totalLost = init.totalLost;
		this.lastSequenceNumber = init.lastSequenceNumber;
		this.jitter = init.jitter;
		this.lastSenderReport = init.lastSenderReport;
		this.delay = init.delay;
	}

	static decode(data: Buffer): ReceptionReport {
		return new ReceptionReport(ReceptionReportLayout.decode(data, true));
	}

	encode(): Buffer {
		return ReceptionReportLayout.encode(this);
	}
}

export function decodeReports(data: Buffer, count: number): ReceptionReport[] {
	const reports: ReceptionReport[] = [];
	for (let i = 0; i < count; i++) {
		reports.push(
			ReceptionReport.decode(data.subarray(i * RECEPTION_REPORT_LENGTH)),
		);
	}
	return reports;
}
