export * from './artifact';
export * from './content';
export * from './agent';
export * from './query-plan';
