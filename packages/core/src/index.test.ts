import * as t from "vitest";
import { AckTier, computeStatistics, createRunContext, InMemoryTransport, renderReport, SessionController } from "./index";

t.it("should run a session end to end and report on it", async () => {
	const transport = new InMemoryTransport();
	const context = createRunContext({
		transport,
		config: { topic: "test", ackTier: AckTier.AT_LEAST_ONCE, totalExpectedMessages: 4, networkCondition: "lan" },
		now: () => 1000,
	});
	const controller = new SessionController(context);

	const run = controller.start();
	await t.vi.waitFor(() => t.expect(controller.currentState).toBe("receiving"));
	for (const [sequenceNumber, sendTime] of [
		[0, 990],
		[1, 980],
		[2, 970],
	]) {
		transport.deliver("test", `${sequenceNumber} ${sendTime}`);
	}
	await controller.stop();
	await run;

	const stats = computeStatistics(context.runtime.recorder.snapshot(), { expectedTotal: context.config.totalExpectedMessages });
	const report = renderReport(stats, {
		startTime: controller.startedAt,
		networkCondition: context.config.networkCondition,
		ackTier: context.config.ackTier,
		dataFile: "data/run.json",
	});

	t.expect(stats.receivedCount).toBe(3);
	t.expect(stats.lossPercent).toBe(25);
	t.expect(stats.latency).toEqual({ min: 10, max: 30, mean: 20, median: 20, standardDeviation: 10 });
	t.expect(report.split("\n").slice(0, 9)).toEqual([
		"Subscriber",
		"----------",
		"Start time: 1970-01-01T00:00:01.000Z",
		"Network conditions: lan",
		"Acknowledgment tier: 1 (at-least-once)",
		"Data file: data/run.json",
		"Number of packets sent: 4",
		"Number of packets received: 3",
		"Packet loss: 25%",
	]);
});
