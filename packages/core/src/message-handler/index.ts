import { ErrorCode, ProtocolViolationError } from "../domain/errors";
import type { RunContext } from "../domain/run-context";
import { type Arrival, createArrival } from "../domain/sample";
import type { InboundMessage } from "../domain/transport";

export type ParsedPayload = {
	sequenceNumber: number;
	sendTime: number;
};

const INTEGER = /^-?\d+$/;

/**
 * Parses a `"<sequence number> <send time ms>"` payload.
 * The publisher is part of the harness, so any deviation is a contract violation.
 *
 * @throws ProtocolViolationError when the payload is not valid UTF-8 or not two integers.
 */
export function parsePayload(payload: Uint8Array): ParsedPayload {
	let text: string;
	try {
		text = new TextDecoder("utf-8", { fatal: true }).decode(payload);
	} catch {
		throw new ProtocolViolationError(ErrorCode.PAYLOAD_MALFORMED, "Payload is not valid UTF-8");
	}

	const fields = text.trim().split(/\s+/);
	if (fields.length !== 2 || !fields.every((field) => INTEGER.test(field))) {
		throw new ProtocolViolationError(ErrorCode.PAYLOAD_MALFORMED, `Expected "<sequence> <send time>", got ${JSON.stringify(text)}`);
	}

	const [sequenceNumber, sendTime] = fields.map(Number);
	if (!Number.isSafeInteger(sequenceNumber) || sequenceNumber < 0) {
		throw new ProtocolViolationError(ErrorCode.PAYLOAD_MALFORMED, `Invalid sequence number: ${fields[0]}`);
	}
	if (!Number.isSafeInteger(sendTime)) {
		throw new ProtocolViolationError(ErrorCode.PAYLOAD_MALFORMED, `Invalid send time: ${fields[1]}`);
	}

	return { sequenceNumber, sendTime };
}

/**
 * Turns inbound messages on the configured topic into Arrival samples.
 */
export class MessageHandler {
	constructor(private readonly context: RunContext) {}

	/**
	 * Records the message if it was published on the harness topic.
	 * @returns The appended arrival, or null for messages on other topics.
	 */
	public handle(message: InboundMessage): Arrival | null {
		if (message.topic !== this.context.config.topic) return null;

		const receiveTime = this.context.now();
		const { sequenceNumber, sendTime } = parsePayload(message.payload);
		const arrival = createArrival(sequenceNumber, sendTime, receiveTime, message.tier);
		this.context.runtime.recorder.append(arrival);
		return arrival;
	}
}
