export const clamp = (value: number, min: number, max: number): number => {
  if (Number.isNaN(value)) return min;
  if (value < min) return min;
  if (value > max) return max;
  return value;
};

export const clamp01 = (value: number): number => clamp(value, 0, 1);

export const sum = (values: readonly number[]): number => values.reduce((acc, value) => acc + value, 0);

export const mean = (values: readonly number[]): number => (values.length === 0 ? 0 : sum(values) / values.length);

/** Sample (n - 1) standard deviation; zero for fewer than two values. */
export const sampleStdDev = (values: readonly number[]): number => {
  if (values.length < 2) return 0;
  const center = mean(values);
  const squared = values.reduce((acc, value) => acc + (value - center) ** 2, 0);
  return Math.sqrt(squared / (values.length - 1));
};

export const round = (value: number, digits: number): number => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

export interface HalfSplit {
  readonly earlierMean: number;
  readonly laterMean: number;
  /** Fractional change of the later half against the earlier one; undefined when the earlier mean is zero. */
  readonly change: number | undefined;
}

/**
 * Splits by count into two contiguous halves. With an odd count the later half
 * takes the extra point.
 */
export const halfSplit = (values: readonly number[]): HalfSplit | undefined => {
  if (values.length < 2) return undefined;
  const pivot = Math.floor(values.length / 2);
  const earlierMean = mean(values.slice(0, pivot));
  const laterMean = mean(values.slice(pivot));
  return {
    earlierMean,
    laterMean,
    change: earlierMean === 0 ? undefined : (laterMean - earlierMean) / earlierMean,
  };
};

export interface LinearFit {
  readonly slope: number;
  readonly intercept: number;
  /** Mean squared residual around the fitted line. */
  readonly residualVariance: number;
}

/** Least squares over (index, value) pairs. */
export const fitLinear = (values: readonly number[]): LinearFit => {
  const n = values.length;
  if (n === 0) return { slope: 0, intercept: 0, residualVariance: 0 };
  if (n === 1) return { slope: 0, intercept: values[0], residualVariance: 0 };

  const xMean = (n - 1) / 2;
  const yMean = mean(values);
  let covariance = 0;
  let xVariance = 0;
  values.forEach((value, index) => {
    covariance += (index - xMean) * (value - yMean);
    xVariance += (index - xMean) ** 2;
  });
  const slope = covariance / xVariance;
  const intercept = yMean - slope * xMean;
  const residualVariance = values.reduce((acc, value, index) => acc + (value - (intercept + slope * index)) ** 2, 0) / n;
  return { slope, intercept, residualVariance };
};

export const predict = (fit: LinearFit, index: number): number => fit.intercept + fit.slope * index;
