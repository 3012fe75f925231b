export * from './dto';
export * from './enums';
export * from './mappers/code.mapper';
export * from './mappers/callback.mapper';
export * from './zibal.constants';
export * from './zibal.interface';
export * from './zibal.client';
export * from './zibal.module';
