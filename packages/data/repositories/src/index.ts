export * from './interfaces';
export * from './memory';
export * from './query';
