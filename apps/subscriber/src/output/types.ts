import type { SessionConfig, Statistics } from "@churn-harness/core";

/**
 * Complete results of one run, as written by `--output`.
 */
export interface RunResults {
	timestamp: string;
	target: string;
	config: SessionConfig;
	metadata: {
		/** First successful connection, null when the run never connected. */
		startTime: string | null;
		stopTime: string;
		dataFile: string;
		reportFile: string;
		faults: number;
		reconnects: number;
	};
	statistics: Statistics;
}
