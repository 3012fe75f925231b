export * from './percent-mode.enum';
export * from './fee-mode.enum';
export * from './result-code.enum';
export * from './transaction-status.enum';
