export * from './event-stream';
export * from './events';
export * from './executor';
export * from './progress';
export * from './response';
export * from './usage';
