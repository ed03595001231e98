export const DEFAULT_LIMIT = 100;
export const MAX_LIMIT = 5000;

export const normalizeLimit = (limit?: number): number => {
  if (limit === undefined || !Number.isFinite(limit)) return DEFAULT_LIMIT;
  if (limit < 1) return 1;
  if (limit > MAX_LIMIT) return MAX_LIMIT;
  return Math.floor(limit);
};
