import { describeAckTier, formatNumber, INSUFFICIENT_DATA, type LatencyStatistics } from "@churn-harness/core";
import chalk from "chalk";
import type { RunResults } from "./types.js";

function formatLatency(latency: LatencyStatistics): string {
	const deviation = latency.standardDeviation === null ? chalk.dim("n/a") : `${formatNumber(latency.standardDeviation)}ms`;
	return `min=${formatNumber(latency.min)}ms, mean=${formatNumber(latency.mean)}ms, median=${formatNumber(latency.median)}ms, max=${formatNumber(latency.max)}ms, stdev=${deviation}`;
}

function formatLoss(lossPercent: number | null): string {
	if (lossPercent === null) return chalk.dim(INSUFFICIENT_DATA);
	const color = lossPercent <= 0 ? chalk.green : lossPercent <= 5 ? chalk.yellow : chalk.red;
	return color(`${formatNumber(lossPercent)}%`);
}

/**
 * Print run results summary to console.
 */
export function printResults(results: RunResults): void {
	const { statistics, metadata, config } = results;
	const { latency, disconnects } = statistics;

	console.log(chalk.gray("─────────────────────────────────────"));
	console.log(chalk.bold("         RESULTS SUMMARY"));
	console.log(chalk.gray("─────────────────────────────────────"));

	console.log(`Tier:        ${describeAckTier(config.ackTier)}`);
	console.log(`Network:     ${config.networkCondition}`);
	console.log(`Received:    ${statistics.receivedCount}/${statistics.expectedCount} (loss ${formatLoss(statistics.lossPercent)})`);
	console.log(`Latency:     ${latency ? formatLatency(latency) : chalk.dim(INSUFFICIENT_DATA)}`);

	if (statistics.duplicateCount > 0 || statistics.outOfOrderCount > 0) {
		console.log(chalk.yellow(`Ordering:    ${statistics.duplicateCount} duplicate, ${statistics.outOfOrderCount} out of order`));
	}

	console.log("");
	console.log(chalk.bold("Disconnects:"));
	console.log(`  Forced:    ${disconnects.count} (${chalk.green("↻")} ${disconnects.reconnected} reconnected, ${chalk.yellow("…")} ${disconnects.pending} pending)`);
	if (disconnects.outage) {
		const { min, mean, max } = disconnects.outage;
		console.log(`  Outage:    min=${formatNumber(min)}ms, mean=${formatNumber(mean)}ms, max=${formatNumber(max)}ms`);
	}
	if (metadata.reconnects > disconnects.reconnected) {
		console.log(chalk.yellow(`  Broker-initiated reconnects: ${metadata.reconnects - disconnects.reconnected}`));
	}

	console.log("");
	console.log(`Samples:     ${chalk.dim(metadata.dataFile)}`);
	console.log(`Report:      ${chalk.dim(metadata.reportFile)}`);
	console.log(chalk.gray("─────────────────────────────────────"));
}
