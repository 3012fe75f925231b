import { HttpModule, HttpModuleOptions } from '@nestjs/axios';
import { DynamicModule, Module } from '@nestjs/common';
import { SharedModule } from '@/shared.module';
import { ZibalClient } from './zibal.client';

@Module({})
export class ZibalModule {
  /**
   * `options` configure the axios instance behind `ZibalClient`; its lifetime is
   * that of the application the module is imported into.
   */
  static register(options: HttpModuleOptions = {}): DynamicModule {
    return {
      module: ZibalModule,
      imports: [SharedModule, HttpModule.register(options)],
      providers: [ZibalClient],
      exports: [ZibalClient],
    };
  }
}
