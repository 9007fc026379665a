import EventEmitter from "eventemitter3";
import { ErrorCode, isAbortError, isTransientError, SessionError } from "../domain/errors";
import type { RunContext } from "../domain/run-context";
import type { Arrival, DisconnectMarker } from "../domain/sample";
import type { DisconnectReason, InboundMessage } from "../domain/transport";
import { FaultInjector } from "../fault-injector";
import { MessageHandler } from "../message-handler";
import { retry } from "../utils/retry";
import { secondsToMs, sleep } from "../utils/timing";

export type ControllerState = "idle" | "connecting" | "receiving" | "quiescent" | "reconnecting" | "stopped";

export type ConnectPhase = "connect" | "reconnect";

export type SessionControllerEvents = {
	state: (state: ControllerState) => void;
	/** First successful connection of the run. */
	connected: (at: Date) => void;
	disconnected: (reason: DisconnectReason) => void;
	/** A reconnect completed. `marker` is the DisconnectMarker it closed, if any. */
	reconnected: (marker: DisconnectMarker | null) => void;
	retry: (phase: ConnectPhase, error: unknown, attempt: number, backoffMs: number) => void;
	arrival: (arrival: Arrival) => void;
	fault: (marker: DisconnectMarker) => void;
	"injector-started": (injector: FaultInjector) => void;
};

export type SessionControllerOptions = {
	/** Base delay in milliseconds for exponential backoff between connection attempts. */
	retryDelayMs?: number;
	/** Backoff never grows past this, so attempts continue at a steady pace during long outages. */
	maxRetryDelayMs?: number;
};

const BASE_RETRY_DELAY = 500;
const MAX_RETRY_DELAY = 5000;

/**
 * Owns the connect → receive → disconnect → wait → reconnect cycle of a run.
 *
 * The cycle repeats until the run's stop signal is raised. Connection timeouts
 * are retried forever; any other transport error, or a malformed payload, ends
 * the run and rejects `start()`.
 */
export class SessionController extends EventEmitter<SessionControllerEvents> {
	private readonly handler: MessageHandler;
	private state: ControllerState = "idle";
	private running: Promise<void> | null = null;
	private injectorTask: Promise<void> = Promise.resolve();
	private fatal: unknown = null;
	private connectedAt: Date | null = null;

	constructor(
		private readonly context: RunContext,
		private readonly options: SessionControllerOptions = {},
	) {
		super();
		this.handler = new MessageHandler(context);
	}

	public get currentState(): ControllerState {
		return this.state;
	}

	/** Time of the first successful connection, null until then. */
	public get startedAt(): Date | null {
		return this.connectedAt;
	}

	/**
	 * Runs the session until `stop()` is called.
	 * Resolves once the run has shut down cleanly and the recorder is finalized.
	 */
	public start(): Promise<void> {
		if (this.state !== "idle") {
			return Promise.reject(new SessionError(ErrorCode.SESSION_INVALID_STATE, `Cannot start when state is ${this.state}`));
		}
		this.running = this.run();
		return this.running;
	}

	/**
	 * Raises the stop signal and waits for the run to finish.
	 * Never rejects; a fatal error is reported through `start()`.
	 */
	public async stop(): Promise<void> {
		this.context.runtime.stop.abort();
		if (this.running) {
			await this.running.catch(() => undefined);
		}
	}

	private readonly onMessage = (message: InboundMessage): void => {
		try {
			const arrival = this.handler.handle(message);
			if (arrival) this.emit("arrival", arrival);
		} catch (error) {
			this.fail(error);
		}
	};

	private async run(): Promise<void> {
		const { transport, runtime } = this.context;
		const { signal } = runtime.stop;
		transport.on("message", this.onMessage);

		try {
			await this.establish("connect");
			this.connectedAt = new Date(this.context.now());
			this.emit("connected", this.connectedAt);
			this.startInjector();

			while (!signal.aborted) {
				this.setState("receiving");
				const reason = await this.receive(signal);
				if (reason === null) break;
				this.emit("disconnected", reason);

				this.setState("quiescent");
				await sleep(secondsToMs(this.context.config.quiescentSec), signal);
				if (signal.aborted) break;

				const marker = await this.establish("reconnect");
				this.emit("reconnected", marker);
			}
		} catch (error) {
			if (!isAbortError(error)) this.fail(error);
		} finally {
			await this.shutdown();
		}

		if (this.fatal !== null) throw this.fatal;
	}

	/**
	 * Connects (or reconnects), retrying transient failures until it succeeds or the run stops.
	 * On reconnect, stamps the pending DisconnectMarker in the same turn the connection completes.
	 */
	private async establish(phase: ConnectPhase): Promise<DisconnectMarker | null> {
		const { transport, config, runtime } = this.context;
		this.setState(phase === "connect" ? "connecting" : "reconnecting");

		const marker = await retry(
			async () => {
				if (phase === "connect") {
					await transport.connect();
					return null;
				}
				await transport.reconnect();
				return runtime.recorder.markReconnected(this.context.now());
			},
			{
				delay: this.options.retryDelayMs ?? BASE_RETRY_DELAY,
				maxDelay: this.options.maxRetryDelayMs ?? MAX_RETRY_DELAY,
				signal: runtime.stop.signal,
				shouldRetry: isTransientError,
				onRetry: (error, attempt, backoffMs) => this.emit("retry", phase, error, attempt, backoffMs),
			},
		);

		await transport.subscribe(config.topic, config.ackTier);
		return marker;
	}

	/**
	 * The receive phase: waits until the transport stops, or the run is stopped (null).
	 */
	private receive(signal: AbortSignal): Promise<DisconnectReason | null> {
		return new Promise((resolve) => {
			if (signal.aborted) {
				resolve(null);
				return;
			}
			const onAbort = () => resolve(null);
			signal.addEventListener("abort", onAbort, { once: true });
			void this.context.transport.closed().then((reason) => {
				signal.removeEventListener("abort", onAbort);
				resolve(reason);
			});
		});
	}

	/**
	 * Starts fault injection on the first connection only. Later calls are no-ops.
	 */
	private startInjector(): void {
		const { config, runtime } = this.context;
		if (runtime.injector !== null || config.faultProbability <= 0) return;

		const injector = new FaultInjector(this.context, { canFire: () => this.state === "receiving" });
		injector.on("fault", (marker) => this.emit("fault", marker));
		runtime.injector = injector;
		this.injectorTask = injector.start().catch((error: unknown) => this.fail(error));
		this.emit("injector-started", injector);
	}

	private fail(error: unknown): void {
		if (this.fatal === null) this.fatal = error;
		this.context.runtime.stop.abort();
	}

	private async shutdown(): Promise<void> {
		const { transport, runtime } = this.context;
		runtime.stop.abort();
		await this.injectorTask;
		transport.off("message", this.onMessage);
		await transport.disconnect();
		runtime.recorder.finalize();
		this.setState("stopped");
	}

	private setState(state: ControllerState): void {
		if (this.state === state) return;
		this.state = state;
		this.emit("state", state);
	}
}
