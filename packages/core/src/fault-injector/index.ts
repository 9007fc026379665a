import EventEmitter from "eventemitter3";
import type { RunContext } from "../domain/run-context";
import { createDisconnectMarker, type DisconnectMarker, NO_SEQUENCE } from "../domain/sample";
import { secondsToMs, sleep } from "../utils/timing";

export type FaultInjectorEvents = {
	fault: (marker: DisconnectMarker) => void;
};

export type FaultInjectorOptions = {
	/**
	 * Checked before firing. Lets the controller hold off faults while it is
	 * not in its receive phase, so a disconnect never lands mid-reconnect.
	 */
	canFire?: () => boolean;
};

/**
 * Forces disconnects at random to simulate connection churn.
 *
 * Every check interval it draws a uniform value and, when it falls at or below
 * the configured probability, records a DisconnectMarker and disconnects the
 * transport. After firing it stays quiet for the quiescent duration so it does
 * not trigger again while the controller is reconnecting.
 */
export class FaultInjector extends EventEmitter<FaultInjectorEvents> {
	private task: Promise<void> | null = null;
	private fired = 0;

	constructor(
		private readonly context: RunContext,
		private readonly options: FaultInjectorOptions = {},
	) {
		super();
	}

	public get faultCount(): number {
		return this.fired;
	}

	/**
	 * Starts the periodic task. It runs until the run's stop signal is raised.
	 * Calling start again returns the task already running.
	 */
	public start(): Promise<void> {
		if (!this.task) {
			this.task = this.loop();
		}
		return this.task;
	}

	/**
	 * Resolves once the task has stopped. Resolves immediately if it never started.
	 */
	public stopped(): Promise<void> {
		return this.task ?? Promise.resolve();
	}

	/**
	 * Runs a single check.
	 * @returns The marker recorded for the forced disconnect, or null if no fault fired.
	 */
	public async tick(): Promise<DisconnectMarker | null> {
		const { config, runtime, transport } = this.context;
		const probability = config.faultProbability;
		if (probability <= 0 || this.context.random() > probability) return null;
		if (this.options.canFire && !this.options.canFire()) return null;

		const lastSeen = runtime.recorder.lastArrival()?.sequenceNumber ?? NO_SEQUENCE;
		const marker = createDisconnectMarker(lastSeen, this.context.now());
		runtime.recorder.append(marker);
		this.fired++;
		this.emit("fault", marker);

		await transport.disconnect();
		return marker;
	}

	private async loop(): Promise<void> {
		const { signal } = this.context.runtime.stop;
		const intervalMs = secondsToMs(this.context.config.checkIntervalSec);
		const quiescentMs = secondsToMs(this.context.config.quiescentSec);

		while (!signal.aborted) {
			await sleep(intervalMs, signal);
			if (signal.aborted) break;

			const marker = await this.tick();
			if (marker) {
				await sleep(quiescentMs, signal);
			}
		}
	}
}
