import 'reflect-metadata';

export * from './common/exceptions';
export * from './shared/constants/error-code.constant';
export * from './shared/services/config.service';
export * from './shared/services/logger.service';
export * from './shared.module';
export * from './modules/zibal';
