import { type Arrival, type DisconnectMarker, isArrival, isDisconnectMarker, type Sample } from "../domain/sample";

export type LatencyStatistics = {
	min: number;
	max: number;
	/**
	 * Sum of arrival latencies divided by the length of the whole log,
	 * DisconnectMarkers included. Lower than the arrival mean whenever a fault fired.
	 */
	mean: number;
	median: number;
	/** Sample standard deviation. Null with fewer than two arrivals. */
	standardDeviation: number | null;
};

export type OutageStatistics = {
	min: number;
	mean: number;
	max: number;
};

export type DisconnectStatistics = {
	count: number;
	reconnected: number;
	/** Markers still waiting for a reconnect when the run stopped. */
	pending: number;
	/** Duration of the reconnected outages. Null when none reconnected. */
	outage: OutageStatistics | null;
};

export type Statistics = {
	expectedCount: number;
	/** Every arrival, duplicates included. */
	receivedCount: number;
	/** Null when no messages were expected. */
	lossPercent: number | null;
	/** Null when nothing arrived. */
	latency: LatencyStatistics | null;
	duplicateCount: number;
	/** Arrivals carrying a lower sequence number than one seen before them. */
	outOfOrderCount: number;
	disconnects: DisconnectStatistics;
};

export type StatisticsOptions = {
	expectedTotal: number;
};

/**
 * Reduces a finalized sample log into the run's statistics.
 */
export function computeStatistics(samples: ReadonlyArray<Readonly<Sample>>, options: StatisticsOptions): Statistics {
	const arrivals: Readonly<Arrival>[] = [];
	const markers: Readonly<DisconnectMarker>[] = [];
	for (const sample of samples) {
		if (isArrival(sample)) arrivals.push(sample);
		else if (isDisconnectMarker(sample)) markers.push(sample);
	}

	const { expectedTotal } = options;
	return {
		expectedCount: expectedTotal,
		receivedCount: arrivals.length,
		lossPercent: expectedTotal > 0 ? ((expectedTotal - arrivals.length) / expectedTotal) * 100 : null,
		latency: latencyOf(arrivals, samples.length),
		...orderingOf(arrivals),
		disconnects: disconnectsOf(markers),
	};
}

function latencyOf(arrivals: ReadonlyArray<Readonly<Arrival>>, logLength: number): LatencyStatistics | null {
	if (arrivals.length === 0) return null;

	const latencies = arrivals.map((arrival) => arrival.latency).sort((a, b) => a - b);
	const sum = latencies.reduce((total, latency) => total + latency, 0);

	return {
		min: latencies[0],
		max: latencies[latencies.length - 1],
		mean: sum / logLength,
		median: median(latencies),
		standardDeviation: standardDeviation(latencies, sum / latencies.length),
	};
}

/**
 * @param sorted - ascending, non-empty
 */
export function median(sorted: ReadonlyArray<number>): number {
	const middle = Math.floor(sorted.length / 2);
	if (sorted.length % 2 === 1) return sorted[middle];
	return (sorted[middle - 1] + sorted[middle]) / 2;
}

export function standardDeviation(values: ReadonlyArray<number>, mean: number): number | null {
	if (values.length < 2) return null;
	const squares = values.reduce((total, value) => total + (value - mean) ** 2, 0);
	return Math.sqrt(squares / (values.length - 1));
}

function orderingOf(arrivals: ReadonlyArray<Readonly<Arrival>>): Pick<Statistics, "duplicateCount" | "outOfOrderCount"> {
	const seen = new Set<number>();
	let highest = -Infinity;
	let duplicateCount = 0;
	let outOfOrderCount = 0;

	for (const { sequenceNumber } of arrivals) {
		if (seen.has(sequenceNumber)) {
			duplicateCount++;
			continue;
		}
		seen.add(sequenceNumber);
		if (sequenceNumber < highest) outOfOrderCount++;
		highest = Math.max(highest, sequenceNumber);
	}

	return { duplicateCount, outOfOrderCount };
}

function disconnectsOf(markers: ReadonlyArray<Readonly<DisconnectMarker>>): DisconnectStatistics {
	const outages: number[] = [];
	for (const marker of markers) {
		if (marker.reconnectTime !== null) outages.push(marker.reconnectTime - marker.disconnectTime);
	}

	return {
		count: markers.length,
		reconnected: outages.length,
		pending: markers.length - outages.length,
		outage:
			outages.length === 0
				? null
				: {
						min: Math.min(...outages),
						mean: outages.reduce((total, outage) => total + outage, 0) / outages.length,
						max: Math.max(...outages),
					},
	};
}
