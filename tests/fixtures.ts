import { ReceptionReport } from "../src/packets/receptionReport.js";

/** Build a packet whose length field matches the body size. */
export function rtcp(first: number, type: number, body: number[] = []): Buffer {
	return Buffer.from([first, type, 0x00, body.length / 4, ...body]);
}

export const SSRC_A = [0x90, 0x2f, 0x9e, 0x2e];
export const SSRC_B = [0xbc, 0x5e, 0x9a, 0x40];

export const REPORT_BYTES = [
	...SSRC_B,
	0x00, 0x00, 0x00, 0x00,
	0x00, 0x00, 0x46, 0xe1,
	0x00, 0x00, 0x01, 0x11,
	0x09, 0xf3, 0x64, 0x32,
	0x00, 0x02, 0x4a, 0x79,
];

export function receptionReport(): ReceptionReport {
	return new ReceptionReport({
		ssrc: 0xbc5e9a40,
		fractionLost: 0,
		totalLost: 0,
		lastSequenceNumber: 0x46e1,
		jitter: 273,
		lastSenderReport: 0x9f36432,
		delay: 150137,
	});
}

export const SENDER_REPORT = rtcp(0x81, 0xc8, [
	...SSRC_A,
	0xda, 0x8b, 0xd1, 0xfc, 0xdd, 0xdd, 0xa0, 0x5a,
	0xaa, 0xf4, 0xed, 0xd5,
	0x00, 0x00, 0x00, 0x01,
	0x00, 0x00, 0x00, 0x02,
	...REPORT_BYTES,
]);

export const RECEIVER_REPORT = rtcp(0x81, 0xc9, [...SSRC_A, ...REPORT_BYTES]);

export const GOODBYE = rtcp(0x81, 0xcb, [...SSRC_A, 0x03, 0x46, 0x4f, 0x4f]);
