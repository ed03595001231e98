export * from './models';
export * from './identifiers';
export * from './statistics';
export * from './schemas';
export * from './metric-bands';
export * from './threshold-evaluator';
export * from './signal-detector';
export * from './signal-lifecycle';
export * from './trend-analyzer';
export * from './health';
export * from './dashboard';
export * from './complaints';
export * from './sla';
export * from './interaction-metrics';
export * from './compliance';
