import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { AckTier, freezeSessionConfig, InMemoryTransport, ProtocolViolationError } from "@churn-harness/core";
import * as t from "vitest";
import { DEFAULT_BROKER_CONFIG } from "../config/load.js";
import type { Logger } from "../utils/log.js";
import { type RunOptions, runSubscriber } from "./index.js";

t.describe("runSubscriber", () => {
	let dir: string;
	let transport: InMemoryTransport;
	let abort: AbortController;
	let logger: Logger;

	const options = (): RunOptions => ({
		config: {
			session: freezeSessionConfig({ topic: "test", ackTier: AckTier.AT_LEAST_ONCE, totalExpectedMessages: 4, networkCondition: "lan" }),
			broker: DEFAULT_BROKER_CONFIG,
		},
		transport,
		dataDir: path.join(dir, "data"),
		statsFile: path.join(dir, "qos-stats.txt"),
		signal: abort.signal,
		logger,
		now: () => 1000,
	});

	t.beforeEach(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), "harness-run-"));
		transport = new InMemoryTransport();
		abort = new AbortController();
		logger = { info: t.vi.fn(), success: t.vi.fn(), warn: t.vi.fn(), error: t.vi.fn() };
	});

	t.afterEach(() => {
		abort.abort();
		fs.rmSync(dir, { recursive: true, force: true });
	});

	t.it("should record until interrupted, then write the samples and append the report", async () => {
		const running = runSubscriber(options());
		await t.vi.waitFor(() => t.expect(transport.deliver("test", "0 990")).toBe(true));
		transport.deliver("test", "1 980");

		abort.abort();
		const outcome = await running;

		t.expect(outcome.fatal).toBeNull();
		t.expect(outcome.results.statistics.receivedCount).toBe(2);
		t.expect(outcome.results.statistics.lossPercent).toBe(50);
		t.expect(outcome.results.metadata.startTime).toBe("1970-01-01T00:00:01.000Z");
		t.expect(outcome.results.metadata.dataFile.startsWith(path.join(dir, "data"))).toBe(true);
		t.expect(outcome.results.metadata.dataFile.endsWith("_tier-1_netcond-lan.json")).toBe(true);
		t.expect(JSON.parse(fs.readFileSync(outcome.results.metadata.dataFile, "utf-8"))).toHaveLength(2);
		t.expect(fs.readFileSync(path.join(dir, "qos-stats.txt"), "utf-8")).toBe(outcome.report);
		t.expect(logger.success).toHaveBeenCalledWith("Connected at 1970-01-01T00:00:01.000Z, subscribed to test");
	});

	t.it("should append one report block per run", async () => {
		abort.abort();
		const first = await runSubscriber(options());
		transport = new InMemoryTransport();
		const second = await runSubscriber(options());

		t.expect(fs.readFileSync(path.join(dir, "qos-stats.txt"), "utf-8")).toBe(first.report + second.report);
	});

	t.it("should still report when a malformed payload ends the run", async () => {
		const running = runSubscriber(options());
		await t.vi.waitFor(() => t.expect(transport.deliver("test", "0 990")).toBe(true));
		transport.deliver("test", "not a payload");

		const outcome = await running;

		t.expect(outcome.fatal).toBeInstanceOf(ProtocolViolationError);
		t.expect(outcome.results.statistics.receivedCount).toBe(1);
		t.expect(fs.existsSync(path.join(dir, "qos-stats.txt"))).toBe(true);
	});

	t.it("should report a run that never connected", async () => {
		abort.abort();

		const outcome = await runSubscriber(options());

		t.expect(outcome.fatal).toBeNull();
		t.expect(outcome.results.metadata.startTime).toBeNull();
		t.expect(outcome.report.split("\n")).toContain("Start time: never connected");
		t.expect(transport.connectCalls).toBe(0);
	});
});
