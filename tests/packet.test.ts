import { describe, expect, it, vi } from "vitest";
import { SdesType, VersionPolicy } from "../src/const.js";
import {
	BadVersionError,
	BufferFullError,
	InvalidHeaderError,
	MalformedPacketError,
	PacketTooShortError,
	SettingsError,
} from "../src/exceptions.js";
import {
	decoderFor,
	destinationSsrcs,
	marshal,
	marshalTo,
	unmarshal,
} from "../src/packet.js";
import { Goodbye } from "../src/packets/goodbye.js";
import { PictureLossIndication } from "../src/packets/pictureLossIndication.js";
import { RapidResynchronizationRequest } from "../src/packets/rapidResynchronizationRequest.js";
import { RawPacket } from "../src/packets/rawPacket.js";
import { ReceiverEstimatedMaximumBitrate } from "../src/packets/receiverEstimatedMaximumBitrate.js";
import { ReceiverReport } from "../src/packets/receiverReport.js";
import { SenderReport } from "../src/packets/senderReport.js";
import { SliceLossIndication } from "../src/packets/sliceLossIndication.js";
import { SourceDescription } from "../src/packets/sourceDescription.js";
import { TransportLayerNack } from "../src/packets/transportLayerNack.js";
import { BufferWriter } from "../src/support/buffer.js";
import {
	GOODBYE,
	RECEIVER_REPORT,
	rtcp,
	receptionReport,
	SENDER_REPORT,
	SSRC_A,
} from "./fixtures.js";

const ZERO_SSRCS = new Array<number>(8).fill(0);
const REMB_BODY = [...ZERO_SSRCS, 0x52, 0x45, 0x4d, 0x42, 0, 0, 0, 0];

describe("unmarshal", () => {
	it("throws InvalidHeaderError on empty input", () => {
		expect(() => unmarshal(Buffer.alloc(0))).toThrow(InvalidHeaderError);
	});

	it.each([1, 2, 3])("throws PacketTooShortError on %d bytes", (size) => {
		expect(() => unmarshal(Buffer.alloc(size, 0x80))).toThrow(
			PacketTooShortError,
		);
	});

	it("throws on a trailing fragment after valid packets", () => {
		const data = Buffer.concat([GOODBYE, Buffer.from([0x80, 0xcb])]);
		expect(() => unmarshal(data)).toThrow(PacketTooShortError);
	});

	it("throws when a declared length exceeds the buffer", () => {
		const truncated = Buffer.from([0x81, 0xcb, 0x00, 0x05, ...SSRC_A]);
		const data = Buffer.concat([SENDER_REPORT, truncated]);
		expect(() => unmarshal(data)).toThrow(PacketTooShortError);
	});

	it("decodes a sender report followed by a goodbye in order", () => {
		const packets = unmarshal(Buffer.concat([SENDER_REPORT, GOODBYE]));
		expect(packets).toHaveLength(2);
		expect(packets[0]).toBeInstanceOf(SenderReport);
		expect(packets[1]).toBeInstanceOf(Goodbye);
		expect(destinationSsrcs(packets)).toEqual([
			...SenderReport.unmarshal(SENDER_REPORT).destinationSsrc(),
			...Goodbye.unmarshal(GOODBYE).destinationSsrc(),
		]);
		expect(destinationSsrcs(packets)).toEqual([
			0xbc5e9a40, 0x902f9e2e, 0x902f9e2e,
		]);
	});

	it("decodes a reduced-size feedback packet", () => {
		const packets = unmarshal(rtcp(0x81, 0xce, ZERO_SSRCS));
		expect(packets).toEqual([
			new PictureLossIndication({ senderSsrc: 0, mediaSsrc: 0 }),
		]);
	});

	it("propagates decoder errors", () => {
		const badSdes = rtcp(0x81, 0xca, [...SSRC_A, 0x01, 0x02, 0x61, 0x62]);
		expect(() => unmarshal(Buffer.concat([RECEIVER_REPORT, badSdes]))).toThrow(
			MalformedPacketError,
		);
	});

	it("rejects a compound whose goodbye reason is not UTF-8", () => {
		const bye = rtcp(0x81, 0xcb, [...SSRC_A, 0x02, 0xff, 0xfe, 0x00]);
		expect(() => unmarshal(Buffer.concat([SENDER_REPORT, bye]))).toThrow(
			MalformedPacketError,
		);
	});

	it("keeps unassigned feedback formats as raw packets", () => {
		const data = rtcp(0x9f, 0xcd, [1, 2, 3, 4, 5, 6, 7, 8]);
		const packets = unmarshal(data);
		expect(packets).toHaveLength(1);
		expect(packets[0]).toBeInstanceOf(RawPacket);
		expect(marshal(packets)).toEqual(data);
	});

	it("decodes padded packets inside a compound", () => {
		const sr = new SenderReport({
			ssrc: 5,
			ntpTime: 1n,
			rtpTime: 2,
			packetCount: 3,
			octetCount: 4,
			profileExtensions: Buffer.from([0xee]),
		});
		const packets = unmarshal(Buffer.concat([sr.marshal(), GOODBYE]));
		expect(packets).toEqual([sr, Goodbye.unmarshal(GOODBYE)]);
	});

	describe("version policy", () => {
		const versionOne = Buffer.from(GOODBYE);
		versionOne[0] = 0x41;

		it("rejects other versions by default", () => {
			expect(() => unmarshal(versionOne)).toThrow(BadVersionError);
		});

		it("reports the offending version", () => {
			try {
				unmarshal(Buffer.concat([GOODBYE, versionOne]));
				expect.unreachable();
			} catch (ex) {
				expect(ex).toBeInstanceOf(BadVersionError);
				expect(ex instanceof BadVersionError && ex.version).toBe(1);
			}
		});

		it("accepts other versions when lenient", () => {
			const packets = unmarshal(versionOne, {
				versionPolicy: VersionPolicy.Lenient,
			});
			expect(packets).toEqual([new Goodbye([0x902f9e2e], "FOO")]);
		});
	});

	it("throws SettingsError on invalid options", () => {
		const options = JSON.parse('{"versionPolicy": "loose"}');
		expect(() => unmarshal(GOODBYE, options)).toThrow(SettingsError);
	});

	describe("logging", () => {
		it("logs every sub-packet", () => {
			const logger = { isEnabledFor: () => true, debug: vi.fn() };
			unmarshal(GOODBYE, { logger });
			expect(logger.debug).toHaveBeenCalledOnce();
			expect(logger.debug).toHaveBeenCalledWith(
				"%s (%s)",
				"Decoding RTCP packet",
				`count=1, data=${GOODBYE.toString("hex")}, offset=0, type=Goodbye`,
			);
		});

		it("logs raw fallbacks", () => {
			const logger = { debug: vi.fn() };
			unmarshal(rtcp(0x80, 0xcc), { logger });
			expect(logger.debug).toHaveBeenCalledTimes(2);
			expect(logger.debug).toHaveBeenLastCalledWith(
				"%s (%s)",
				"No decoder, keeping raw packet",
				"count=0, type=204",
			);
		});

		it("skips disabled loggers", () => {
			const logger = { isEnabledFor: () => false, debug: vi.fn() };
			unmarshal(GOODBYE, { logger });
			expect(logger.debug).not.toHaveBeenCalled();
		});
	});
});

describe("decoderFor", () => {
	it.each([
		["sender report", rtcp(0x80, 0xc8, new Array<number>(24).fill(0)), SenderReport],
		["receiver report", rtcp(0x80, 0xc9, [0, 0, 0, 0]), ReceiverReport],
		["source description", rtcp(0x80, 0xca), SourceDescription],
		["goodbye", rtcp(0x80, 0xcb), Goodbye],
		["application defined", rtcp(0x80, 0xcc), RawPacket],
		["transport layer nack", rtcp(0x81, 0xcd, ZERO_SSRCS), TransportLayerNack],
		[
			"rapid resynchronization request",
			rtcp(0x85, 0xcd, ZERO_SSRCS),
			RapidResynchronizationRequest,
		],
		["transport-wide feedback", rtcp(0x8f, 0xcd, ZERO_SSRCS), RawPacket],
		["unassigned transport feedback", rtcp(0x9f, 0xcd, ZERO_SSRCS), RawPacket],
		["picture loss indication", rtcp(0x81, 0xce, ZERO_SSRCS), PictureLossIndication],
		["slice loss indication", rtcp(0x82, 0xce, ZERO_SSRCS), SliceLossIndication],
		[
			"receiver estimated maximum bitrate",
			rtcp(0x8f, 0xce, REMB_BODY),
			ReceiverEstimatedMaximumBitrate,
		],
		["full intra request", rtcp(0x84, 0xce, ZERO_SSRCS), RawPacket],
		["unknown type", rtcp(0x80, 0x00), RawPacket],
		["extended report", rtcp(0x80, 0xcf, [0, 0, 0, 0]), RawPacket],
	])("routes %s", (_name, data, expected) => {
		const header = data.subarray(0, 4);
		const packet = decoderFor(header[1], header[0] & 0x1f)(data);
		expect(packet).toBeInstanceOf(expected);
		expect(unmarshal(data)[0]).toBeInstanceOf(expected);
	});

	it("preserves feedback type bits in raw packets", () => {
		const data = rtcp(0x9f, 0xcd, ZERO_SSRCS);
		expect(decoderFor(0xcd, 31)(data).marshal()).toEqual(data);
	});
});

describe("marshal", () => {
	const packets = [
		new SenderReport({
			ssrc: 0x902f9e2e,
			ntpTime: 0xda8bd1fcdddda05an,
			rtpTime: 0xaaf4edd5,
			packetCount: 1,
			octetCount: 2,
			reports: [receptionReport()],
		}),
		new ReceiverReport({ ssrc: 7, reports: [receptionReport()] }),
		new SourceDescription([
			{ source: 7, items: [{ type: SdesType.Cname, text: "host" }] },
		]),
		new Goodbye([7], "done"),
		new TransportLayerNack({
			senderSsrc: 7,
			mediaSsrc: 8,
			nacks: [{ packetId: 1, lostPackets: 0xff }],
		}),
		new RapidResynchronizationRequest({ senderSsrc: 7, mediaSsrc: 8 }),
		new PictureLossIndication({ senderSsrc: 7, mediaSsrc: 8 }),
		new SliceLossIndication({
			senderSsrc: 7,
			mediaSsrc: 8,
			entries: [{ first: 1, number: 2, picture: 3 }],
		}),
		new ReceiverEstimatedMaximumBitrate({
			senderSsrc: 7,
			bitrate: 500000,
			ssrcs: [8],
		}),
		RawPacket.unmarshal(rtcp(0x9f, 0xcd, ZERO_SSRCS)),
	];

	it("concatenates packets in order", () => {
		expect(marshal(packets.slice(0, 1))).toEqual(SENDER_REPORT);
		expect(
			marshal([SenderReport.unmarshal(SENDER_REPORT), Goodbye.unmarshal(GOODBYE)]),
		).toEqual(Buffer.concat([SENDER_REPORT, GOODBYE]));
	});

	it("round trips every packet kind", () => {
		expect(unmarshal(marshal(packets))).toEqual(packets);
	});

	it("writes the sum of declared packet lengths", () => {
		const declared = packets.reduce(
			(sum, packet) => sum + (packet.header().length + 1) * 4,
			0,
		);
		expect(marshal(packets).length).toBe(declared);
	});

	it("writes nothing for no packets", () => {
		expect(marshal([])).toEqual(Buffer.alloc(0));
	});

	it("stops at the first failing write", () => {
		const writer = new BufferWriter(12);
		const goodbye = Goodbye.unmarshal(rtcp(0x81, 0xcb, SSRC_A));
		const rrr = new RapidResynchronizationRequest({ senderSsrc: 1, mediaSsrc: 2 });
		expect(() => marshalTo([goodbye, rrr, goodbye], writer)).toThrow(
			BufferFullError,
		);
		expect(writer.toBuffer()).toEqual(goodbye.marshal());
	});

	it("propagates writer errors unchanged", () => {
		const failure = new Error("socket closed");
		const writer = {
			write: vi.fn(() => {
				throw failure;
			}),
		};
		expect(() => marshalTo(packets, writer)).toThrow(failure);
		expect(writer.write).toHaveBeenCalledOnce();
	});
});
