export * from './context';
export * from './ingestion';
export * from './detection';
export * from './notifications';
export * from './scheduler';
export * from './signals';
export * from './metrics';
export * from './complaints';
export * from './performance';
export * from './dashboard';
export * from './regulatory';
export * from './monitor';
