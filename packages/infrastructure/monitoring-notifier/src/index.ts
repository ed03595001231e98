export * from './types';
export * from './sns-notifier';
export * from './null-notifier';
