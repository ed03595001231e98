export * from './brand';
export * from './limits';
export * from './time';
