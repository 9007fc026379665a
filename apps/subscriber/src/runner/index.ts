import {
	computeStatistics,
	createRunContext,
	type ISubscriberTransport,
	type RunContext,
	renderReport,
	SessionController,
} from "@churn-harness/core";
import type { SingleBar } from "cli-progress";
import type { HarnessConfig } from "../config/load.js";
import type { RunResults } from "../output/types.js";
import { appendReport, sampleFileName, writeSamples } from "../output/writer.js";
import { errorMessage, type Logger } from "../utils/log.js";
import { createReceiveProgressBar, startProgressBar, stopProgressBar, updateProgressBar } from "../utils/progress.js";

export interface RunOptions {
	config: HarnessConfig;
	transport: ISubscriberTransport;
	/** Directory the sample file is written to. */
	dataDir: string;
	/** Cumulative report file a block is appended to. */
	statsFile: string;
	/** Raised on interrupt. Stops the run and goes on to the report. */
	signal: AbortSignal;
	logger: Logger;
	progress?: boolean;
	now?: () => number;
}

export interface RunOutcome {
	results: RunResults;
	/** The report block appended to the stats file. */
	report: string;
	/** The error that ended the run, null when it was stopped by the signal. */
	fatal: unknown;
}

interface Counters {
	received: number;
	faults: number;
	reconnects: number;
}

function attachLogging(controller: SessionController, context: RunContext, logger: Logger, counters: Counters, bar: SingleBar | null): void {
	const refresh = () => {
		if (bar) updateProgressBar(bar, counters.received, { faults: counters.faults, reconnects: counters.reconnects });
	};

	controller.on("connected", (at) => logger.success(`Connected at ${at.toISOString()}, subscribed to ${context.config.topic}`));
	controller.on("injector-started", () => logger.info(`Fault injection started (p=${context.config.faultProbability} every ${context.config.checkIntervalSec}s)`));
	controller.on("fault", (marker) => {
		counters.faults++;
		refresh();
		if (!bar) logger.info(`Injected disconnect after sequence number ${marker.lastSeenSequenceNumber}`);
	});
	controller.on("disconnected", (reason) => {
		if (!bar) logger.info(`Disconnected: ${reason.reason} (${reason.code})`);
	});
	controller.on("reconnected", (marker) => {
		counters.reconnects++;
		refresh();
		if (bar) return;
		if (marker?.reconnectTime != null) {
			logger.info(`Reconnected after ${marker.reconnectTime - marker.disconnectTime}ms`);
		} else {
			logger.info("Reconnected");
		}
	});
	controller.on("retry", (phase, error, attempt, backoffMs) => {
		logger.warn(`${phase === "connect" ? "Connection" : "Reconnection"} attempt ${attempt} failed (${errorMessage(error)}), retrying in ${backoffMs}ms`);
	});
	controller.on("arrival", () => {
		counters.received++;
		refresh();
	});
	context.transport.on("error", (error) => logger.warn(`Transport: ${error.message}`));
}

/**
 * Runs one measurement session until the signal is raised or a fatal error
 * ends it, then writes the sample file, appends the report and returns the results.
 */
export async function runSubscriber(options: RunOptions): Promise<RunOutcome> {
	const { config, transport, logger } = options;
	const now = options.now ?? Date.now;
	const context = createRunContext({ config: config.session, transport, now });
	const controller = new SessionController(context);
	const counters: Counters = { received: 0, faults: 0, reconnects: 0 };
	const bar = options.progress ? createReceiveProgressBar("Received") : null;
	const launchedAt = new Date(now());

	attachLogging(controller, context, logger, counters, bar);
	const onInterrupt = () => context.runtime.stop.abort();
	options.signal.addEventListener("abort", onInterrupt, { once: true });
	if (options.signal.aborted) onInterrupt();

	if (bar) startProgressBar(bar, config.session.totalExpectedMessages);
	let fatal: unknown = null;
	try {
		await controller.start();
	} catch (error) {
		fatal = error;
	} finally {
		options.signal.removeEventListener("abort", onInterrupt);
		if (bar) stopProgressBar(bar);
	}

	logger.info("Calculating statistics...");
	const samples = context.runtime.recorder.snapshot();
	const startedAt = controller.startedAt;
	const dataFile = writeSamples(options.dataDir, sampleFileName(startedAt ?? launchedAt, config.session.ackTier, config.session.networkCondition), samples);

	const statistics = computeStatistics(samples, { expectedTotal: config.session.totalExpectedMessages });
	const report = renderReport(statistics, {
		startTime: startedAt,
		networkCondition: config.session.networkCondition,
		ackTier: config.session.ackTier,
		dataFile,
	});
	appendReport(options.statsFile, report);

	return {
		results: {
			timestamp: launchedAt.toISOString(),
			target: config.broker.url,
			config: { ...config.session },
			metadata: {
				startTime: startedAt ? startedAt.toISOString() : null,
				stopTime: new Date(now()).toISOString(),
				dataFile,
				reportFile: options.statsFile,
				faults: context.runtime.injector?.faultCount ?? 0,
				reconnects: counters.reconnects,
			},
			statistics,
		},
		report,
		fatal,
	};
}
