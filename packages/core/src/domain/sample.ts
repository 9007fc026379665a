import type { AckTier } from "./ack-tier";

/** Sequence number carried by every DisconnectMarker, and by `lastSeenSequenceNumber` when nothing arrived yet. */
export const NO_SEQUENCE = -1;

/**
 * A message that reached the subscriber.
 * All times are millisecond epoch integers.
 */
export type Arrival = {
	kind: "arrival";
	sequenceNumber: number;
	sendTime: number;
	receiveTime: number;
	/** Always `receiveTime - sendTime`. */
	latency: number;
	/** Tier the message was delivered at, which may be lower than the one requested. */
	deliveryTier: AckTier;
};

/**
 * A disconnect forced by the fault injector.
 * `reconnectTime` stays `null` (pending) until the controller completes the next reconnect.
 */
export type DisconnectMarker = {
	kind: "disconnect";
	sequenceNumber: typeof NO_SEQUENCE;
	lastSeenSequenceNumber: number;
	disconnectTime: number;
	reconnectTime: number | null;
};

export type Sample = Arrival | DisconnectMarker;

export function createArrival(sequenceNumber: number, sendTime: number, receiveTime: number, deliveryTier: AckTier): Arrival {
	return {
		kind: "arrival",
		sequenceNumber,
		sendTime,
		receiveTime,
		latency: receiveTime - sendTime,
		deliveryTier,
	};
}

export function createDisconnectMarker(lastSeenSequenceNumber: number, disconnectTime: number): DisconnectMarker {
	return {
		kind: "disconnect",
		sequenceNumber: NO_SEQUENCE,
		lastSeenSequenceNumber,
		disconnectTime,
		reconnectTime: null,
	};
}

export function isArrival(sample: Sample): sample is Arrival {
	return sample.kind === "arrival";
}

export function isDisconnectMarker(sample: Sample): sample is DisconnectMarker {
	return sample.kind === "disconnect";
}
