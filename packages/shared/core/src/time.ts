export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export const HOUR_MS = 3_600_000;
export const DAY_MS = 24 * HOUR_MS;

export const toIso = (at: number): string => new Date(at).toISOString();
