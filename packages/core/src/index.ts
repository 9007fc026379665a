export { AckTier, describeAckTier, isAckTier } from "./domain/ack-tier";
export { ConfigError, ErrorCode, HarnessError, isAbortError, isTransientError, ProtocolViolationError, SessionError, TransportError } from "./domain/errors";
export { createRunContext, type RunContext, type RunContextOptions, type RuntimeState } from "./domain/run-context";
export { type Arrival, createArrival, createDisconnectMarker, type DisconnectMarker, isArrival, isDisconnectMarker, NO_SEQUENCE, type Sample } from "./domain/sample";
export { DEFAULT_SESSION_CONFIG, freezeSessionConfig, type SessionConfig } from "./domain/session-config";
export type { DisconnectReason, InboundMessage, ISubscriberTransport, TransportEvents } from "./domain/transport";
export { FaultInjector, type FaultInjectorEvents, type FaultInjectorOptions } from "./fault-injector";
export { MessageHandler, parsePayload } from "./message-handler";
export { SampleRecorder } from "./recorder";
export {
	type ConnectPhase,
	type ControllerState,
	SessionController,
	type SessionControllerEvents,
	type SessionControllerOptions,
} from "./session/controller";
export { computeStatistics, type DisconnectStatistics, type LatencyStatistics, type OutageStatistics, type Statistics } from "./stats";
export { formatNumber, INSUFFICIENT_DATA, type ReportMetadata, renderReport } from "./stats/report";
export { CentrifugeTransport, type CentrifugeTransportOptions } from "./transport/centrifuge";
export { InMemoryTransport } from "./transport/in-memory";
export { secondsToMs, sleep } from "./utils/timing";
