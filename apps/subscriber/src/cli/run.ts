#!/usr/bin/env node
import { CentrifugeTransport, describeAckTier, HarnessError, secondsToMs } from "@churn-harness/core";
import chalk from "chalk";
import { Command } from "commander";
import { config as loadDotenv } from "dotenv";
import WebSocket from "ws";
import { loadConfig, parseBrokerUrl } from "../config/load.js";
import { printResults } from "../output/formatter.js";
import { writeResults } from "../output/writer.js";
import { runSubscriber } from "../runner/index.js";
import { createConsoleLogger, errorMessage } from "../utils/log.js";

interface CliOptions {
	file?: string;
	url?: string;
	dataDir: string;
	statsFile: string;
	output?: string;
	progress: boolean;
}

const logger = createConsoleLogger();

async function main(cli: CliOptions): Promise<number> {
	loadDotenv();
	const loaded = loadConfig(cli.file);
	for (const warning of loaded.warnings) logger.warn(warning);

	const broker = cli.url ? { ...loaded.broker, url: parseBrokerUrl(cli.url, "--url") } : loaded.broker;
	const { session } = loaded;

	console.log(chalk.bold.blue("╔══════════════════════════════════════╗"));
	console.log(chalk.bold.blue("║       CHURN HARNESS SUBSCRIBER       ║"));
	console.log(chalk.bold.blue("╚══════════════════════════════════════╝"));
	console.log("");
	console.log(chalk.bold("Configuration:"));
	console.log(`  Broker:      ${chalk.dim(broker.url)}`);
	console.log(`  Topic:       ${chalk.cyan(session.topic)}`);
	console.log(`  Tier:        ${describeAckTier(session.ackTier)}`);
	console.log(`  Expected:    ${chalk.bold(session.totalExpectedMessages)} messages`);
	console.log(`  Faults:      p=${session.faultProbability} every ${session.checkIntervalSec}s, ${session.quiescentSec}s quiescent`);
	console.log(`  Network:     ${session.networkCondition}`);
	if (cli.output) {
		console.log(`  Output:      ${chalk.dim(cli.output)}`);
	}
	console.log("");

	const transport = CentrifugeTransport.create({
		url: broker.url,
		token: broker.token ?? undefined,
		websocket: WebSocket,
		keepaliveSec: broker.keepaliveSec,
		connectTimeoutMs: secondsToMs(broker.connectTimeoutSec),
	});

	const interrupt = new AbortController();
	const onSignal = (signal: NodeJS.Signals) => {
		if (interrupt.signal.aborted) return;
		console.log("");
		logger.info(`Received ${signal}, shutting down...`);
		interrupt.abort();
	};
	process.on("SIGINT", onSignal);
	process.on("SIGTERM", onSignal);

	logger.info("Press Ctrl+C to stop and write the report.");
	const outcome = await runSubscriber({
		config: { session, broker },
		transport,
		dataDir: cli.dataDir,
		statsFile: cli.statsFile,
		signal: interrupt.signal,
		logger,
		progress: cli.progress,
	}).finally(() => {
		process.off("SIGINT", onSignal);
		process.off("SIGTERM", onSignal);
	});

	console.log("");
	printResults(outcome.results);

	if (cli.output) {
		console.log("");
		writeResults(cli.output, outcome.results);
		logger.info(`Results written to ${cli.output}`);
	}

	if (outcome.fatal !== null) {
		logger.error(`Run ended with an error: ${describeError(outcome.fatal)}`);
		return 1;
	}

	console.log("");
	console.log(chalk.green("✓ Subscriber closed successfully"));
	return 0;
}

function describeError(error: unknown): string {
	return error instanceof HarnessError ? `${error.code}: ${error.message}` : errorMessage(error);
}

const program = new Command();

program
	.name("subscriber")
	.description("Subscribe to a topic, inject connection faults and report latency and loss")
	.version("0.1.0")
	.option("-f, --file <path>", "JSON configuration file")
	.option("--url <url>", "WebSocket URL of the broker (overrides the configuration)")
	.option("--data-dir <path>", "Directory for per-run sample files", "data")
	.option("--stats-file <path>", "Cumulative report file", "qos-stats.txt")
	.option("--output <path>", "Path to write JSON results")
	.option("--progress", "Show a progress bar instead of per-event log lines", false)
	.action(async (cli: CliOptions) => {
		try {
			process.exit(await main(cli));
		} catch (error) {
			logger.error(describeError(error));
			process.exit(1);
		}
	});

program.parseAsync().catch((error: unknown) => {
	logger.error(describeError(error));
	process.exit(1);
});
