import { InvalidValueError } from "../../exceptions.js";
import type { FeedbackSources } from "../feedback.js";
import {
	createTccFeedback,
	MAX_LARGE_DELTA,
	MIN_LARGE_DELTA,
	REFERENCE_TIME_MILLISECONDS,
	type TccFeedbackPacket,
	TICK_MICROSECONDS,
} from "./feedback.js";

const TICKS_PER_MILLISECOND = 1000 / TICK_MICROSECONDS;
const MAX_REFERENCE_TIME = 0xffffff;
const MAX_PACKET_STATUS_COUNT = 0xffff;

export interface TccFeedbackBuilderOptions extends FeedbackSources {
	baseSequenceNumber: number;
	/** Arrival time of the first packet, in milliseconds. */
	referenceTimeMs: number;
	feedbackPacketCount: number;
}

/**
 * Collects received packets, in sequence number order, into a feedback
 * packet. Sequence numbers that are skipped are reported as not received.
 */
export class TccFeedbackBuilder {
	private readonly options: TccFeedbackBuilderOptions;
	private readonly referenceTime: number;
	private readonly packets: { delta?: number }[] = [];
	private lastArrivalTicks: number;
	private nextSequenceNumber: number;

	constructor(options: TccFeedbackBuilderOptions) {
		if (options.referenceTimeMs < 0) {
			throw new InvalidValueError(
				`negative reference time ${options.referenceTimeMs}`,
			);
		}
		this.options = options;
		const units = Math.floor(
			options.referenceTimeMs / REFERENCE_TIME_MILLISECONDS,
		);
		this.referenceTime = units & MAX_REFERENCE_TIME;
		this.lastArrivalTicks =
			units * REFERENCE_TIME_MILLISECONDS * TICKS_PER_MILLISECOND;
		this.nextSequenceNumber = options.baseSequenceNumber & 0xffff;
	}

	get packetCount(): number {
		return this.packets.length;
	}

	/**
	 * Add a packet that arrived at `arrivalTimeMs`. Returns false, leaving the
	 * builder unchanged, when the packet is out of order, its delta does not
	 * fit in 16 signed bits or the status count would overflow.
	 */
	addReceivedPacket(sequenceNumber: number, arrivalTimeMs: number): boolean {
		const gap = (sequenceNumber - this.nextSequenceNumber) & 0xffff;
		if (gap >= 0x8000) {
			return false;
		}
		if (this.packets.length + gap + 1 > MAX_PACKET_STATUS_COUNT) {
			return false;
		}
		const arrivalTicks = Math.round(arrivalTimeMs * TICKS_PER_MILLISECOND);
		const delta = arrivalTicks - this.lastArrivalTicks;
		if (delta < MIN_LARGE_DELTA || delta > MAX_LARGE_DELTA) {
			return false;
		}
		for (let i = 0; i < gap; i++) {
			this.packets.push({});
		}
		this.packets.push({ delta });
		this.lastArrivalTicks = arrivalTicks;
		this.nextSequenceNumber = (sequenceNumber + 1) & 0xffff;
		return true;
	}

	build(): TccFeedbackPacket {
		return createTccFeedback({
			senderSsrc: this.options.senderSsrc,
			mediaSsrc: this.options.mediaSsrc,
			baseSequenceNumber: this.options.baseSequenceNumber & 0xffff,
			referenceTime: this.referenceTime,
			feedbackPacketCount: this.options.feedbackPacketCount,
			packets: this.packets,
		});
	}
}
