import EventEmitter from "eventemitter3";
import type { AckTier } from "../domain/ack-tier";
import type { DisconnectReason, ISubscriberTransport, TransportEvents } from "../domain/transport";

const CLIENT_DISCONNECT: DisconnectReason = { code: 0, reason: "disconnect called" };

/**
 * An ISubscriberTransport that lives entirely in process.
 * Messages are injected with `deliver`; connection failures are scripted with `failNextConnect`.
 */
export class InMemoryTransport extends EventEmitter<TransportEvents> implements ISubscriberTransport {
	public connectCalls = 0;
	public reconnectCalls = 0;
	public disconnectCalls = 0;

	private connected = false;
	private lastReason: DisconnectReason = CLIENT_DISCONNECT;
	private readonly failures: Error[] = [];
	private readonly subscriptions = new Map<string, AckTier>();
	/** Overrides the tier reported on delivered messages, to mimic a broker downgrade. */
	private grantedTier: AckTier | null = null;

	public connect(): Promise<void> {
		this.connectCalls++;
		return this.open();
	}

	public reconnect(): Promise<void> {
		this.reconnectCalls++;
		return this.open();
	}

	public disconnect(): Promise<void> {
		this.disconnectCalls++;
		this.close(CLIENT_DISCONNECT);
		return Promise.resolve();
	}

	public subscribe(topic: string, tier: AckTier): Promise<void> {
		if (!this.subscriptions.has(topic)) {
			this.subscriptions.set(topic, tier);
		}
		return Promise.resolve();
	}

	public closed(): Promise<DisconnectReason> {
		if (!this.connected) return Promise.resolve(this.lastReason);
		return new Promise((resolve) => this.once("disconnected", resolve));
	}

	public isConnected(): boolean {
		return this.connected;
	}

	/**
	 * Queues an error for the next connect or reconnect attempt.
	 */
	public failNextConnect(error: Error): void {
		this.failures.push(error);
	}

	public downgradeTo(tier: AckTier): void {
		this.grantedTier = tier;
	}

	/**
	 * Simulates the broker closing the connection.
	 */
	public drop(reason: DisconnectReason): void {
		this.close(reason);
	}

	/**
	 * Delivers a message as the broker would. Dropped unless connected and subscribed.
	 * @returns Whether the message was delivered.
	 */
	public deliver(topic: string, payload: string | Uint8Array): boolean {
		const tier = this.subscriptions.get(topic);
		if (!this.connected || tier === undefined) return false;
		const bytes = typeof payload === "string" ? new TextEncoder().encode(payload) : payload;
		this.emit("message", { topic, payload: bytes, tier: this.grantedTier ?? tier });
		return true;
	}

	private open(): Promise<void> {
		const failure = this.failures.shift();
		if (failure) return Promise.reject(failure);
		if (!this.connected) {
			this.connected = true;
			this.emit("connected");
		}
		return Promise.resolve();
	}

	private close(reason: DisconnectReason): void {
		if (!this.connected) return;
		this.connected = false;
		this.lastReason = reason;
		this.emit("disconnected", reason);
	}
}
