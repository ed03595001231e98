export * from './time-series-buffer';
export * from './metric-series-store';
export * from './record-logs';
export * from './repositories';
