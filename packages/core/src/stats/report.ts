import { type AckTier, describeAckTier } from "../domain/ack-tier";
import type { Statistics } from "./index";

export type ReportMetadata = {
	/** First successful connection. Null when the run never connected. */
	startTime: Date | null;
	networkCondition: string;
	ackTier: AckTier;
	dataFile: string;
};

export const INSUFFICIENT_DATA = "insufficient data";

/**
 * Rounds to at most three decimals and drops trailing zeros.
 */
export function formatNumber(value: number): string {
	return Number(value.toFixed(3)).toString();
}

const ms = (value: number) => `${formatNumber(value)}ms`;

/**
 * Renders one report block. Blocks are appended one after another to the
 * cumulative report file, so each ends with a blank separator.
 */
export function renderReport(stats: Statistics, metadata: ReportMetadata): string {
	const { latency, disconnects } = stats;
	const deviation = latency ? latency.standardDeviation : null;
	const lines = [
		"Subscriber",
		"----------",
		`Start time: ${metadata.startTime ? metadata.startTime.toISOString() : "never connected"}`,
		`Network conditions: ${metadata.networkCondition}`,
		`Acknowledgment tier: ${describeAckTier(metadata.ackTier)}`,
		`Data file: ${metadata.dataFile}`,
		`Number of packets sent: ${stats.expectedCount}`,
		`Number of packets received: ${stats.receivedCount}`,
		`Packet loss: ${stats.lossPercent === null ? INSUFFICIENT_DATA : `${formatNumber(stats.lossPercent)}%`}`,
		"---End-to-End Delay",
		`Min: ${latency ? ms(latency.min) : INSUFFICIENT_DATA}`,
		`Mean: ${latency ? ms(latency.mean) : INSUFFICIENT_DATA}`,
		`Median: ${latency ? ms(latency.median) : INSUFFICIENT_DATA}`,
		`Max: ${latency ? ms(latency.max) : INSUFFICIENT_DATA}`,
		`Standard Deviation: ${deviation === null ? `undefined (${INSUFFICIENT_DATA})` : formatNumber(deviation)}`,
		"---Delivery",
		`Duplicates: ${stats.duplicateCount}`,
		`Out of order: ${stats.outOfOrderCount}`,
		"---Disconnects",
		`Forced disconnects: ${disconnects.count}`,
		`Reconnected: ${disconnects.reconnected}`,
		`Pending: ${disconnects.pending}`,
		`Outage min/mean/max: ${disconnects.outage ? [disconnects.outage.min, disconnects.outage.mean, disconnects.outage.max].map(ms).join(" / ") : INSUFFICIENT_DATA}`,
	];
	return `${lines.join("\n")}\n\n\n`;
}
