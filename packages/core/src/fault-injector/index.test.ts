import * as t from "vitest";
import { AckTier } from "../domain/ack-tier";
import { createRunContext, type RunContext } from "../domain/run-context";
import { createArrival, NO_SEQUENCE } from "../domain/sample";
import { InMemoryTransport } from "../transport/in-memory";
import { FaultInjector } from "./index";

t.describe("FaultInjector", () => {
	let transport: InMemoryTransport;

	const contextWith = (config: Parameters<typeof createRunContext>[0]["config"], random: () => number = () => 0.5): RunContext =>
		createRunContext({ transport, config, random, now: () => 5000 });

	t.beforeEach(async () => {
		transport = new InMemoryTransport();
		await transport.connect();
	});

	t.describe("tick", () => {
		t.test("should never fire when the probability is zero, even on a zero draw", async () => {
			const context = contextWith({ faultProbability: 0 }, () => 0);
			const injector = new FaultInjector(context);

			t.expect(await injector.tick()).toBeNull();
			t.expect(context.runtime.recorder.size).toBe(0);
			t.expect(transport.disconnectCalls).toBe(0);
		});

		t.test("should fire when the draw equals the probability", async () => {
			const context = contextWith({ faultProbability: 0.25 }, () => 0.25);
			const injector = new FaultInjector(context);

			const marker = await injector.tick();

			t.expect(marker).toEqual({
				kind: "disconnect",
				sequenceNumber: NO_SEQUENCE,
				lastSeenSequenceNumber: NO_SEQUENCE,
				disconnectTime: 5000,
				reconnectTime: null,
			});
			t.expect(transport.isConnected()).toBe(false);
			t.expect(injector.faultCount).toBe(1);
		});

		t.test("should not fire when the draw is above the probability", async () => {
			const context = contextWith({ faultProbability: 0.25 }, () => 0.26);

			t.expect(await new FaultInjector(context).tick()).toBeNull();
			t.expect(transport.isConnected()).toBe(true);
		});

		t.test("should hold off while canFire says no", async () => {
			const context = contextWith({ faultProbability: 1 }, () => 0);
			const injector = new FaultInjector(context, { canFire: () => false });

			t.expect(await injector.tick()).toBeNull();
			t.expect(transport.disconnectCalls).toBe(0);
		});

		t.test("should record the last arrival seen before the disconnect", async () => {
			const context = contextWith({ faultProbability: 1 }, () => 0);
			const { recorder } = context.runtime;
			for (const sequenceNumber of [1, 2, 3]) {
				recorder.append(createArrival(sequenceNumber, 0, 10, AckTier.AT_MOST_ONCE));
			}

			const marker = await new FaultInjector(context).tick();
			recorder.append(createArrival(4, 0, 10, AckTier.AT_MOST_ONCE));

			t.expect(marker?.lastSeenSequenceNumber).toBe(3);
			t.expect(recorder.snapshot().map((sample) => sample.sequenceNumber)).toEqual([1, 2, 3, NO_SEQUENCE, 4]);
		});

		t.test("should emit a fault event with the marker", async () => {
			const context = contextWith({ faultProbability: 1 }, () => 0);
			const injector = new FaultInjector(context);
			const onFault = t.vi.fn();
			injector.on("fault", onFault);

			const marker = await injector.tick();

			t.expect(onFault).toHaveBeenCalledWith(marker);
		});
	});

	t.describe("start", () => {
		t.test("should keep checking on every interval until stopped", async () => {
			const random = t.vi.fn(() => 0.9);
			const context = contextWith({ faultProbability: 0.5, checkIntervalSec: 0.005 }, random);
			const injector = new FaultInjector(context);

			const task = injector.start();
			await t.vi.waitFor(() => t.expect(random.mock.calls.length).toBeGreaterThanOrEqual(3));
			context.runtime.stop.abort();
			await task;

			t.expect(context.runtime.recorder.size).toBe(0);
		});

		t.test("should return the running task when started twice", () => {
			const context = contextWith({ faultProbability: 0.5, checkIntervalSec: 0.005 });
			const injector = new FaultInjector(context);

			const first = injector.start();
			t.expect(injector.start()).toBe(first);
			context.runtime.stop.abort();
			return first;
		});

		t.test("should stop promptly when the signal is raised mid-sleep", async () => {
			const context = contextWith({ faultProbability: 1, checkIntervalSec: 5, quiescentSec: 5 }, () => 0);
			const injector = new FaultInjector(context);
			const startedAt = Date.now();

			const task = injector.start();
			setTimeout(() => context.runtime.stop.abort(), 20);
			await task;

			t.expect(Date.now() - startedAt).toBeLessThan(2000);
			t.expect(injector.faultCount).toBe(0);
		});

		t.test("should wait out the quiescent duration after firing", async () => {
			const context = contextWith({ faultProbability: 1, checkIntervalSec: 0.005, quiescentSec: 5 }, () => 0);
			const injector = new FaultInjector(context);

			const task = injector.start();
			await t.vi.waitFor(() => t.expect(injector.faultCount).toBe(1));
			await new Promise((resolve) => setTimeout(resolve, 50));
			t.expect(injector.faultCount).toBe(1);

			context.runtime.stop.abort();
			await task;
		});

		t.test("stopped should resolve when the task never started", async () => {
			const injector = new FaultInjector(contextWith({ faultProbability: 1 }));

			await t.expect(injector.stopped()).resolves.toBeUndefined();
		});
	});
});
