export enum ErrorCode {
	// Transport errors
	TRANSPORT_CONNECT_TIMEOUT = "TRANSPORT_CONNECT_TIMEOUT",
	TRANSPORT_CONNECT_REJECTED = "TRANSPORT_CONNECT_REJECTED",
	TRANSPORT_SUBSCRIBE_FAILED = "TRANSPORT_SUBSCRIBE_FAILED",
	TRANSPORT_DISCONNECTED = "TRANSPORT_DISCONNECTED",

	// Payload errors
	PAYLOAD_MALFORMED = "PAYLOAD_MALFORMED",

	// Session errors
	SESSION_INVALID_STATE = "SESSION_INVALID_STATE",
	RECORDER_FINALIZED = "RECORDER_FINALIZED",

	// Configuration errors
	CONFIG_INVALID = "CONFIG_INVALID",

	// Cancellation
	ABORTED = "ABORTED",

	// Generic fallback
	UNKNOWN = "UNKNOWN",
}

export class HarnessError extends Error {
	constructor(
		public readonly code: ErrorCode,
		message?: string,
	) {
		super(message || code);
		this.name = code;
	}
}

export class TransportError extends HarnessError {}
export class ProtocolViolationError extends HarnessError {}
export class SessionError extends HarnessError {}
export class ConfigError extends HarnessError {}

/**
 * Connectivity failures that are retried indefinitely at connect and reconnect.
 * Everything else reaching the controller is fatal.
 */
export function isTransientError(error: unknown): boolean {
	return error instanceof TransportError && error.code === ErrorCode.TRANSPORT_CONNECT_TIMEOUT;
}

export function isAbortError(error: unknown): boolean {
	return error instanceof HarnessError && error.code === ErrorCode.ABORTED;
}
