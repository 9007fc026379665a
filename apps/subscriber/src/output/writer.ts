import * as fs from "node:fs";
import * as path from "node:path";
import type { AckTier, Sample } from "@churn-harness/core";
import type { RunResults } from "./types.js";

const pad = (value: number) => String(value).padStart(2, "0");

/**
 * Formats a local timestamp as `YYYY-MM-DD_HH-mm-ss`.
 */
export function formatFileTimestamp(date: Date): string {
	const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
	const time = `${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`;
	return `${day}_${time}`;
}

/**
 * Makes a network-condition label safe to embed in a file name.
 */
export function sanitizeLabel(label: string): string {
	const safe = label
		.trim()
		.replace(/[^A-Za-z0-9._-]+/g, "-")
		.replace(/^-+|-+$/g, "");
	return safe || "unlabelled";
}

export function sampleFileName(startedAt: Date, tier: AckTier, networkCondition: string): string {
	return `${formatFileTimestamp(startedAt)}_tier-${tier}_netcond-${sanitizeLabel(networkCondition)}.json`;
}

function ensureDir(dir: string): void {
	if (dir && !fs.existsSync(dir)) {
		fs.mkdirSync(dir, { recursive: true });
	}
}

/**
 * Write the ordered sample sequence of a run to a JSON file.
 * @returns The path written.
 */
export function writeSamples(dir: string, fileName: string, samples: ReadonlyArray<Readonly<Sample>>): string {
	ensureDir(dir);
	const file = path.join(dir, fileName);
	fs.writeFileSync(file, JSON.stringify(samples, null, 2));
	return file;
}

/**
 * Append one report block to the cumulative report file.
 */
export function appendReport(file: string, block: string): void {
	ensureDir(path.dirname(file));
	fs.appendFileSync(file, block);
}

/**
 * Write run results to a JSON file.
 */
export function writeResults(outputPath: string, results: RunResults): void {
	ensureDir(path.dirname(outputPath));
	fs.writeFileSync(outputPath, JSON.stringify(results, null, 2));
}
