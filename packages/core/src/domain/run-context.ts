import type { FaultInjector } from "../fault-injector";
import { SampleRecorder } from "../recorder";
import { type SessionConfig, freezeSessionConfig } from "./session-config";
import type { ISubscriberTransport } from "./transport";

/**
 * Mutable state of a run, kept apart from the frozen configuration.
 */
export type RuntimeState = {
	readonly recorder: SampleRecorder;
	/** Raised once to stop the controller, the injector and every pending wait. */
	readonly stop: AbortController;
	/** Set on the first successful connection when fault injection is enabled. */
	injector: FaultInjector | null;
};

/**
 * Everything a component of the harness needs, passed by reference to each of them.
 */
export type RunContext = {
	readonly config: Readonly<SessionConfig>;
	readonly transport: ISubscriberTransport;
	readonly runtime: RuntimeState;
	/** Millisecond epoch clock. */
	readonly now: () => number;
	/** Uniform random value in [0, 1). */
	readonly random: () => number;
};

export type RunContextOptions = {
	config?: Partial<SessionConfig>;
	transport: ISubscriberTransport;
	now?: () => number;
	random?: () => number;
};

export function createRunContext(options: RunContextOptions): RunContext {
	return {
		config: freezeSessionConfig(options.config),
		transport: options.transport,
		runtime: {
			recorder: new SampleRecorder(),
			stop: new AbortController(),
			injector: null,
		},
		now: options.now ?? Date.now,
		random: options.random ?? Math.random,
	};
}
