import {
	Centrifuge,
	type ConnectingContext,
	type DisconnectedContext,
	type Options,
	type PublicationContext,
	type SubscribedContext,
	type Subscription,
} from "centrifuge";
import EventEmitter from "eventemitter3";
import { AckTier } from "../../domain/ack-tier";
import { ErrorCode, TransportError } from "../../domain/errors";
import type { DisconnectReason, ISubscriberTransport, TransportEvents } from "../../domain/transport";
import { secondsToMs } from "../../utils/timing";

/**
 * Options for creating a CentrifugeTransport instance.
 */
export type CentrifugeTransportOptions = {
	/** URL of the Centrifugo websocket endpoint. */
	url: string;
	/** Connection token, when the server requires one. */
	token?: string;
	/** WebSocket implementation. Required outside the browser. */
	websocket?: unknown;
	/** How long a connect or reconnect may take before it counts as a timeout. */
	connectTimeoutMs?: number;
	/** Longest silence from the server before the client considers the connection dead. */
	keepaliveSec?: number;
	/** How long a subscription may take to be confirmed. */
	subscribeTimeoutMs?: number;
};

type TransportState = "disconnected" | "connecting" | "connected";

const DEFAULT_CONNECT_TIMEOUT = 10_000;
const DEFAULT_SUBSCRIBE_TIMEOUT = 10_000;
const DEFAULT_KEEPALIVE_SEC = 60;

const CLIENT_DISCONNECT: DisconnectReason = { code: 0, reason: "disconnect called" };

/**
 * An ISubscriberTransport backed by a `centrifuge` client.
 *
 * Acknowledgment tiers map onto Centrifugo subscriptions:
 * - at-most-once: a plain subscription, nothing is replayed after a reconnect.
 * - at-least-once: a recoverable, positioned subscription, so the server replays
 *   what was published while the client was away.
 * - exactly-once: as at-least-once, with redelivered publications dropped by
 *   stream offset.
 *
 * When the server does not grant recovery the tier reported on each message
 * drops to at-most-once. Subscriptions outlive a disconnect and are restored
 * by the client on the next connect.
 *
 * How long a disconnected subscriber's stream stays recoverable is set on the
 * server, not here: the channel's `history_ttl` plays the part of a session
 * expiry and should be at least 30s.
 */
export class CentrifugeTransport extends EventEmitter<TransportEvents> implements ISubscriberTransport {
	private state: TransportState = "disconnected";
	private lastReason: DisconnectReason = CLIENT_DISCONNECT;
	private readonly connectTimeoutMs: number;
	private readonly subscribeTimeoutMs: number;

	static create(options: CentrifugeTransportOptions): CentrifugeTransport {
		const opts: Partial<Options> = {
			timeout: options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT,
			maxServerPingDelay: secondsToMs(options.keepaliveSec ?? DEFAULT_KEEPALIVE_SEC),
		};

		if (options.websocket !== undefined) {
			opts.websocket = options.websocket;
		}
		if (options.token) {
			opts.token = options.token;
		}

		return new CentrifugeTransport(new Centrifuge(options.url, opts), options);
	}

	constructor(
		private readonly client: Centrifuge,
		options: Omit<CentrifugeTransportOptions, "url"> = {},
	) {
		super();
		this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT;
		this.subscribeTimeoutMs = options.subscribeTimeoutMs ?? DEFAULT_SUBSCRIBE_TIMEOUT;

		this.client.on("connecting", (ctx: ConnectingContext) => this.setState("connecting", ctx));
		this.client.on("connected", () => this.setState("connected"));
		this.client.on("disconnected", (ctx: DisconnectedContext) => this.setState("disconnected", ctx));
		this.client.on("error", (ctx) => this.emit("error", new TransportError(ErrorCode.UNKNOWN, ctx.error.message)));
	}

	/**
	 * Connects to the server.
	 * @throws TransportError TRANSPORT_CONNECT_TIMEOUT when the server does not answer in time.
	 * @throws TransportError TRANSPORT_CONNECT_REJECTED when the server refuses the connection.
	 */
	public connect(): Promise<void> {
		if (this.state === "connected") {
			return Promise.resolve();
		}

		return new Promise((resolve, reject) => {
			const cleanup = () => {
				clearTimeout(timer);
				this.client.off("connected", onConnected);
				this.client.off("disconnected", onDisconnected);
			};
			const onConnected = () => {
				cleanup();
				resolve();
			};
			const onDisconnected = (ctx: DisconnectedContext) => {
				cleanup();
				reject(new TransportError(ErrorCode.TRANSPORT_CONNECT_REJECTED, `Connection refused: ${ctx.reason} (${ctx.code})`));
			};
			const timer = setTimeout(() => {
				cleanup();
				this.client.disconnect();
				reject(new TransportError(ErrorCode.TRANSPORT_CONNECT_TIMEOUT, `Connection timeout after ${this.connectTimeoutMs}ms`));
			}, this.connectTimeoutMs);

			this.client.on("connected", onConnected);
			this.client.on("disconnected", onDisconnected);
			this.client.connect();
		});
	}

	/**
	 * Connects again after a disconnect. Resolves at once if the client already
	 * restored the connection by itself.
	 */
	public reconnect(): Promise<void> {
		return this.connect();
	}

	/**
	 * Closes the connection. Subscriptions are kept for the next connect.
	 */
	public disconnect(): Promise<void> {
		if (this.state === "disconnected") {
			return Promise.resolve();
		}

		return new Promise((resolve) => {
			this.client.once("disconnected", () => resolve());
			this.client.disconnect();
		});
	}

	/**
	 * Subscribes to a topic at the given tier and waits for the server to confirm.
	 * Subscribing to a topic that already has a subscription only waits for it.
	 */
	public async subscribe(topic: string, tier: AckTier): Promise<void> {
		let sub = this.client.getSubscription(topic);
		if (!sub) {
			sub = this.client.newSubscription(topic, tier === AckTier.AT_MOST_ONCE ? {} : { recoverable: true, positioned: true });
			this.bind(sub, tier);
			sub.subscribe();
		}

		try {
			await sub.ready(this.subscribeTimeoutMs);
		} catch (error) {
			throw new TransportError(ErrorCode.TRANSPORT_SUBSCRIBE_FAILED, `Failed to subscribe to ${topic}: ${errorMessage(error)}`);
		}
	}

	/**
	 * Resolves with the reason of the next disconnect, or of the last one when not connected.
	 */
	public closed(): Promise<DisconnectReason> {
		if (this.state !== "connected") {
			return Promise.resolve(this.lastReason);
		}
		return new Promise((resolve) => this.once("disconnected", resolve));
	}

	public isConnected(): boolean {
		return this.state === "connected";
	}

	private bind(sub: Subscription, requested: AckTier): void {
		let granted = requested;
		let lastOffset = -1;
		let epoch: string | null = null;

		sub.on("subscribed", (ctx: SubscribedContext) => {
			granted = requested !== AckTier.AT_MOST_ONCE && !ctx.recoverable ? AckTier.AT_MOST_ONCE : requested;
			// Offsets only compare within one recovered stream.
			const nextEpoch = ctx.streamPosition?.epoch ?? null;
			if (!ctx.recovered || nextEpoch !== epoch) lastOffset = -1;
			epoch = nextEpoch;
			if (ctx.wasRecovering && !ctx.recovered) {
				this.emit("error", new TransportError(ErrorCode.TRANSPORT_DISCONNECTED, `Stream of ${ctx.channel} could not be recovered; messages may be missing`));
			}
		});

		sub.on("publication", (ctx: PublicationContext) => {
			if (granted === AckTier.EXACTLY_ONCE && typeof ctx.offset === "number") {
				if (ctx.offset <= lastOffset) return;
				lastOffset = ctx.offset;
			}
			this.emit("message", { topic: ctx.channel, payload: toBytes(ctx.data), tier: granted });
		});

		sub.on("error", (ctx) => this.emit("error", new TransportError(ErrorCode.TRANSPORT_SUBSCRIBE_FAILED, `Subscription error: ${ctx.error.message}`)));
	}

	private setState(state: TransportState, reason?: DisconnectReason): void {
		const previous = this.state;
		if (previous === state) return;
		this.state = state;
		if (reason) {
			this.lastReason = { code: reason.code, reason: reason.reason };
		}

		if (state === "connected") {
			this.emit("connected");
		} else if (previous === "connected") {
			this.emit("disconnected", this.lastReason);
		}
	}
}

function toBytes(data: unknown): Uint8Array {
	if (data instanceof Uint8Array) return data;
	const text = typeof data === "string" ? data : JSON.stringify(data);
	return new TextEncoder().encode(text);
}

function errorMessage(error: unknown): string {
	if (error instanceof Error) return error.message;
	if (typeof error === "object" && error !== null && "message" in error && typeof error.message === "string") return error.message;
	return String(error);
}
