export * from './artifact';
export * from './errors';
export * from './resource';
export * from './run';
