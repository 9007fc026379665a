import * as fs from "node:fs";
import { type AckTier, ConfigError, DEFAULT_SESSION_CONFIG, ErrorCode, isAckTier, type SessionConfig } from "@churn-harness/core";

/**
 * Where and how to reach the broker.
 */
export interface BrokerConfig {
	url: string;
	/** Connection token, when the server requires one. */
	token: string | null;
	keepaliveSec: number;
	connectTimeoutSec: number;
}

export interface HarnessConfig {
	session: Readonly<SessionConfig>;
	broker: Readonly<BrokerConfig>;
}

export interface LoadedConfig extends HarnessConfig {
	/** Problems that did not stop the configuration from loading. */
	warnings: string[];
}

export const DEFAULT_BROKER_CONFIG: Readonly<BrokerConfig> = Object.freeze({
	url: "ws://localhost:8000/connection/websocket",
	token: null,
	keepaliveSec: 60,
	connectTimeoutSec: 10,
});

type Section = Record<string, unknown>;
type Reader<T> = (value: unknown, key: string) => T;

const SECTIONS = new Set(["subscriber", "shared", "broker"]);
const SESSION_KEYS = new Set([
	"ack_tier",
	"network_condition",
	"total_expected_messages",
	"fault_probability",
	"check_interval_seconds",
	"quiescent_seconds",
	"topic",
]);
const BROKER_KEYS = new Set(["url", "keepalive_seconds", "connect_timeout_seconds"]);

function invalid(key: string, value: unknown, expected: string): ConfigError {
	return new ConfigError(ErrorCode.CONFIG_INVALID, `Invalid value for ${key}: expected ${expected}, got ${JSON.stringify(value)}`);
}

const number =
	(expected: string, accept: (n: number) => boolean): Reader<number> =>
	(value, key) => {
		if (typeof value === "number" && Number.isFinite(value) && accept(value)) return value;
		throw invalid(key, value, expected);
	};

const count = number("a non-negative integer", (n) => Number.isInteger(n) && n >= 0);
const probability = number("a number between 0 and 1", (n) => n >= 0 && n <= 1);
const positive = number("a positive number", (n) => n > 0);
const nonNegative = number("a non-negative number", (n) => n >= 0);

const text: Reader<string> = (value, key) => {
	if (typeof value === "string" && value.trim() !== "") return value;
	throw invalid(key, value, "a non-empty string");
};

const tier: Reader<AckTier> = (value, key) => {
	if (isAckTier(value)) return value;
	throw invalid(key, value, "0, 1 or 2");
};

const websocketUrl: Reader<string> = (value, key) => {
	const url = text(value, key);
	if (!/^wss?:\/\/\S+$/.test(url)) throw invalid(key, value, "a ws:// or wss:// URL");
	return url;
};

/**
 * Checks a broker URL given outside the configuration file, such as on the command line.
 * @throws ConfigError when it is not a ws:// or wss:// URL.
 */
export function parseBrokerUrl(value: string, source: string): string {
	return websocketUrl(value, source);
}

function read<T>(section: Section, key: string, reader: Reader<T>, fallback: T): T {
	const value = section[key];
	return value === undefined ? fallback : reader(value, key);
}

function isSection(value: unknown): value is Section {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function sectionOf(document: Section, name: string): Section {
	const section = document[name];
	if (section === undefined) return {};
	if (!isSection(section)) throw new ConfigError(ErrorCode.CONFIG_INVALID, `Section "${name}" must be an object`);
	return section;
}

function warnUnknown(section: Section, known: Set<string>, where: string, warnings: string[]): void {
	for (const key of Object.keys(section)) {
		if (!known.has(key)) warnings.push(`Ignoring unknown key "${key}" in ${where}`);
	}
}

function mergeSession(base: SessionConfig, section: Section): SessionConfig {
	return {
		ackTier: read(section, "ack_tier", tier, base.ackTier),
		networkCondition: read(section, "network_condition", text, base.networkCondition),
		totalExpectedMessages: read(section, "total_expected_messages", count, base.totalExpectedMessages),
		faultProbability: read(section, "fault_probability", probability, base.faultProbability),
		checkIntervalSec: read(section, "check_interval_seconds", positive, base.checkIntervalSec),
		quiescentSec: read(section, "quiescent_seconds", nonNegative, base.quiescentSec),
		topic: read(section, "topic", text, base.topic),
	};
}

function mergeBroker(base: BrokerConfig, section: Section): BrokerConfig {
	return {
		url: read(section, "url", websocketUrl, base.url),
		token: base.token,
		keepaliveSec: read(section, "keepalive_seconds", positive, base.keepaliveSec),
		connectTimeoutSec: read(section, "connect_timeout_seconds", positive, base.connectTimeoutSec),
	};
}

function parseDocument(file: string): Section {
	let document: unknown;
	try {
		document = JSON.parse(fs.readFileSync(file, "utf-8"));
	} catch (error) {
		if (error instanceof SyntaxError) {
			throw new ConfigError(ErrorCode.CONFIG_INVALID, `${file} is not valid JSON: ${error.message}`);
		}
		throw error;
	}
	if (!isSection(document)) {
		throw new ConfigError(ErrorCode.CONFIG_INVALID, `${file} must contain a JSON object`);
	}
	return document;
}

/**
 * Loads the run configuration.
 *
 * Values come from the defaults, then the file's `subscriber` section, then its
 * `shared` section, then the environment (`HARNESS_URL`, `HARNESS_TOKEN`,
 * `HARNESS_TOPIC`). A file that does not exist falls back to the defaults with
 * a warning.
 *
 * @throws ConfigError when a value has the wrong type or is out of range.
 */
export function loadConfig(file: string | undefined, env: NodeJS.ProcessEnv = process.env): LoadedConfig {
	const warnings: string[] = [];
	let document: Section = {};

	if (file !== undefined) {
		if (fs.existsSync(file)) {
			document = parseDocument(file);
		} else {
			warnings.push(`${file} is not a valid path. Using default values.`);
		}
	}

	for (const key of Object.keys(document)) {
		if (!SECTIONS.has(key)) warnings.push(`Ignoring unknown section "${key}"`);
	}

	const subscriber = sectionOf(document, "subscriber");
	const shared = sectionOf(document, "shared");
	const brokerSection = sectionOf(document, "broker");
	warnUnknown(subscriber, SESSION_KEYS, "subscriber", warnings);
	warnUnknown(shared, SESSION_KEYS, "shared", warnings);
	warnUnknown(brokerSection, BROKER_KEYS, "broker", warnings);

	const session = mergeSession(mergeSession(DEFAULT_SESSION_CONFIG, subscriber), shared);
	const broker = mergeBroker(DEFAULT_BROKER_CONFIG, brokerSection);

	if (env.HARNESS_TOPIC) session.topic = text(env.HARNESS_TOPIC, "HARNESS_TOPIC");
	if (env.HARNESS_URL) broker.url = websocketUrl(env.HARNESS_URL, "HARNESS_URL");
	if (env.HARNESS_TOKEN) broker.token = env.HARNESS_TOKEN;

	return {
		session: Object.freeze(session),
		broker: Object.freeze(broker),
		warnings,
	};
}
