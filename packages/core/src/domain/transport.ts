import type EventEmitter from "eventemitter3";
import type { AckTier } from "./ack-tier";

/**
 * A message delivered on a subscribed topic.
 */
export type InboundMessage = {
	topic: string;
	payload: Uint8Array;
	/** Tier the broker actually delivered at. */
	tier: AckTier;
};

export type DisconnectReason = {
	code: number;
	reason: string;
};

export type TransportEvents = {
	connected: () => void;
	disconnected: (reason: DisconnectReason) => void;
	message: (message: InboundMessage) => void;
	error: (error: Error) => void;
};

/**
 * Defines the contract for the subscriber side of a pub/sub connection.
 *
 * Sessions are persistent: subscriptions made with `subscribe` survive a
 * `disconnect` and are restored by the transport on `reconnect`.
 */
export interface ISubscriberTransport extends EventEmitter<TransportEvents> {
	/**
	 * Establishes the initial connection.
	 * Rejects with a `TRANSPORT_CONNECT_TIMEOUT` TransportError when the broker
	 * could not be reached in time, or with another error when it refused us.
	 */
	connect(): Promise<void>;

	/**
	 * Re-establishes a connection that was closed, resuming the session.
	 * Fails the same way as `connect`.
	 */
	reconnect(): Promise<void>;

	/**
	 * Closes the connection without discarding the session.
	 * Resolves once the transport reports it is disconnected.
	 */
	disconnect(): Promise<void>;

	/**
	 * Subscribes to a topic. Subscribing again to the same topic is a no-op.
	 */
	subscribe(topic: string, tier: AckTier): Promise<void>;

	/**
	 * Resolves when the connection stops, immediately if it already has.
	 * This is the receive phase: messages are emitted while it is pending.
	 */
	closed(): Promise<DisconnectReason>;

	isConnected(): boolean;
}
