import * as t from "vitest";
import { AckTier } from "../domain/ack-tier";
import { ErrorCode, SessionError } from "../domain/errors";
import { createArrival, createDisconnectMarker, NO_SEQUENCE } from "../domain/sample";
import { SampleRecorder } from "./index";

t.describe("SampleRecorder", () => {
	let recorder: SampleRecorder;

	t.beforeEach(() => {
		recorder = new SampleRecorder();
	});

	t.test("should start empty", () => {
		t.expect(recorder.size).toBe(0);
		t.expect(recorder.mostRecent()).toBeNull();
		t.expect(recorder.lastArrival()).toBeNull();
		t.expect(recorder.snapshot()).toEqual([]);
	});

	t.test("should keep samples in append order, not sequence order", () => {
		recorder.append(createArrival(2, 100, 110, AckTier.AT_MOST_ONCE));
		recorder.append(createArrival(1, 90, 115, AckTier.AT_MOST_ONCE));

		const sequenceNumbers = recorder.snapshot().map((sample) => sample.sequenceNumber);
		t.expect(sequenceNumbers).toEqual([2, 1]);
		t.expect(recorder.mostRecent()?.sequenceNumber).toBe(1);
	});

	t.test("should find the last arrival past a trailing marker", () => {
		recorder.append(createArrival(7, 0, 1, AckTier.AT_MOST_ONCE));
		recorder.append(createDisconnectMarker(7, 5));

		t.expect(recorder.mostRecent()?.sequenceNumber).toBe(NO_SEQUENCE);
		t.expect(recorder.lastArrival()?.sequenceNumber).toBe(7);
	});

	t.describe("markReconnected", () => {
		t.test("should patch the pending marker exactly once", () => {
			recorder.append(createDisconnectMarker(NO_SEQUENCE, 1000));

			const patched = recorder.markReconnected(1500);
			t.expect(patched?.reconnectTime).toBe(1500);

			t.expect(recorder.markReconnected(2000)).toBeNull();
			const [marker] = recorder.snapshot();
			t.expect(marker).toMatchObject({ kind: "disconnect", reconnectTime: 1500 });
		});

		t.test("should patch the marker even when arrivals landed after it", () => {
			recorder.append(createArrival(3, 0, 2, AckTier.AT_LEAST_ONCE));
			recorder.append(createDisconnectMarker(3, 10));
			recorder.append(createArrival(4, 5, 12, AckTier.AT_LEAST_ONCE));

			recorder.markReconnected(40);

			const snapshot = recorder.snapshot();
			t.expect(snapshot[1]).toMatchObject({ kind: "disconnect", reconnectTime: 40 });
			t.expect(snapshot[2]).toEqual(createArrival(4, 5, 12, AckTier.AT_LEAST_ONCE));
		});

		t.test("should only ever patch the most recent marker", () => {
			recorder.append(createDisconnectMarker(NO_SEQUENCE, 10));
			recorder.append(createDisconnectMarker(NO_SEQUENCE, 20));

			recorder.markReconnected(30);

			const reconnectTimes = recorder.snapshot().map((sample) => (sample.kind === "disconnect" ? sample.reconnectTime : undefined));
			t.expect(reconnectTimes).toEqual([null, 30]);
		});

		t.test("should never set a reconnect time earlier than the disconnect time", () => {
			recorder.append(createDisconnectMarker(NO_SEQUENCE, 5000));

			t.expect(recorder.markReconnected(4000)?.reconnectTime).toBe(5000);
		});

		t.test("should return null when no marker exists", () => {
			recorder.append(createArrival(0, 0, 1, AckTier.AT_MOST_ONCE));

			t.expect(recorder.markReconnected(10)).toBeNull();
		});
	});

	t.describe("finalize", () => {
		t.test("should reject appends after finalizing", () => {
			recorder.finalize();

			t.expect(() => recorder.append(createArrival(0, 0, 1, AckTier.AT_MOST_ONCE))).toThrow(SessionError);
			try {
				recorder.append(createArrival(0, 0, 1, AckTier.AT_MOST_ONCE));
			} catch (error) {
				t.expect((error as SessionError).code).toBe(ErrorCode.RECORDER_FINALIZED);
			}
		});

		t.test("should hand out a snapshot that cannot be mutated", () => {
			recorder.append(createDisconnectMarker(NO_SEQUENCE, 10));
			recorder.finalize();

			const snapshot = recorder.snapshot();
			t.expect(Object.isFrozen(snapshot)).toBe(true);
			t.expect(Object.isFrozen(snapshot[0])).toBe(true);

			recorder.markReconnected(20);
			t.expect(snapshot[0]).toMatchObject({ reconnectTime: null });
		});
	});
});
