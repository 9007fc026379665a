/**
 * Delivery guarantee negotiated for the subscription.
 */
export enum AckTier {
	AT_MOST_ONCE = 0,
	AT_LEAST_ONCE = 1,
	EXACTLY_ONCE = 2,
}

const TIER_LABELS: Record<AckTier, string> = {
	[AckTier.AT_MOST_ONCE]: "at-most-once",
	[AckTier.AT_LEAST_ONCE]: "at-least-once",
	[AckTier.EXACTLY_ONCE]: "exactly-once",
};

export function isAckTier(value: unknown): value is AckTier {
	return value === AckTier.AT_MOST_ONCE || value === AckTier.AT_LEAST_ONCE || value === AckTier.EXACTLY_ONCE;
}

export function describeAckTier(tier: AckTier): string {
	return `${tier} (${TIER_LABELS[tier]})`;
}
