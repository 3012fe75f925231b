export * from './zibal.exception';
export * from './invalid-argument.exception';
export * from './deserialization.exception';
