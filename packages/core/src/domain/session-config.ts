import { AckTier } from "./ack-tier";

/**
 * Settings for one measurement run. Frozen once the run starts.
 */
export type SessionConfig = {
	/** Tier requested when subscribing. */
	ackTier: AckTier;
	/** Number of messages the paired publisher sends. Denominator of the loss rate. */
	totalExpectedMessages: number;
	/** Chance, per check interval, that the fault injector forces a disconnect. */
	faultProbability: number;
	checkIntervalSec: number;
	/** Minimum wait after a disconnect before reconnecting. */
	quiescentSec: number;
	/** Free-form tag describing the network setup, used to annotate reports. */
	networkCondition: string;
	/** The single topic the harness subscribes to. */
	topic: string;
};

export const DEFAULT_SESSION_CONFIG: Readonly<SessionConfig> = Object.freeze({
	ackTier: AckTier.AT_MOST_ONCE,
	totalExpectedMessages: 50,
	faultProbability: 0,
	checkIntervalSec: 10,
	quiescentSec: 10,
	networkCondition: "normal",
	topic: "test",
});

export function freezeSessionConfig(overrides: Partial<SessionConfig> = {}): Readonly<SessionConfig> {
	return Object.freeze({ ...DEFAULT_SESSION_CONFIG, ...overrides });
}
