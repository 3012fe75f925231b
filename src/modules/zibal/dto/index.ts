export * from './multiplexing-info.dto';
export * from './create-transaction.dto';
export * from './track-transaction.dto';
export * from './transaction-response.dto';
export * from './callback.dto';
