/**
 * Waits for `ms` milliseconds. When a signal is given the wait ends early,
 * without rejecting, as soon as the signal is aborted.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise((resolve) => {
		if (signal?.aborted) {
			resolve();
			return;
		}
		const onAbort = () => {
			clearTimeout(timer);
			resolve();
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve();
		}, ms);
		signal?.addEventListener("abort", onAbort, { once: true });
	});
}

export function secondsToMs(seconds: number): number {
	return Math.round(seconds * 1000);
}
