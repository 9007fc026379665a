import { ErrorCode, SessionError } from "../domain/errors";
import { type Arrival, type DisconnectMarker, isArrival, isDisconnectMarker, type Sample } from "../domain/sample";

/**
 * Append-only log of samples shared by the controller, the message handler and
 * the fault injector.
 *
 * Every method runs to completion synchronously, so on the single event loop
 * appends and the reconnect patch are linearized without further locking.
 */
export class SampleRecorder {
	private readonly samples: Sample[] = [];
	private finalized = false;

	public get size(): number {
		return this.samples.length;
	}

	public get isFinalized(): boolean {
		return this.finalized;
	}

	/**
	 * Appends a sample to the log.
	 * @throws SessionError once the recorder has been finalized.
	 */
	public append(sample: Sample): void {
		if (this.finalized) {
			throw new SessionError(ErrorCode.RECORDER_FINALIZED, `Cannot append a ${sample.kind} sample after the run has stopped`);
		}
		this.samples.push(sample);
	}

	public mostRecent(): Sample | null {
		return this.samples[this.samples.length - 1] ?? null;
	}

	public lastArrival(): Arrival | null {
		for (let i = this.samples.length - 1; i >= 0; i--) {
			const sample = this.samples[i];
			if (isArrival(sample)) return sample;
		}
		return null;
	}

	/**
	 * Stamps the reconnect time onto the most recently appended DisconnectMarker.
	 * Arrivals appended after the marker are skipped over. A marker that was
	 * already patched is left alone.
	 *
	 * @returns The patched marker, or null when there was no pending marker.
	 */
	public markReconnected(reconnectTime: number): DisconnectMarker | null {
		for (let i = this.samples.length - 1; i >= 0; i--) {
			const sample = this.samples[i];
			if (!isDisconnectMarker(sample)) continue;
			if (sample.reconnectTime !== null) return null;
			sample.reconnectTime = Math.max(reconnectTime, sample.disconnectTime);
			return sample;
		}
		return null;
	}

	/**
	 * Makes the log read-only. Idempotent.
	 */
	public finalize(): void {
		this.finalized = true;
	}

	/**
	 * Returns a frozen copy of the log in append order.
	 */
	public snapshot(): ReadonlyArray<Readonly<Sample>> {
		return Object.freeze(this.samples.map((sample) => Object.freeze({ ...sample })));
	}
}
