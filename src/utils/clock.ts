/**
 * Millisecond wall clock. Components take one so tests can drive time.
 */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();
