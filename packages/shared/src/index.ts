export * from './concurrency/map-with-limit';
export * from './ids';
export * from './logging/json-log';
export * from './standards';
