import { Module, type DynamicModule } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { LoggingModule } from '../logging/logging.module';
import { ModelModule } from '../model/model.module';
import { UuidModule } from '../uuid/uuid.module';
import type { UuidModuleOptions } from '../uuid/uuid.options';

/**
 * Root module: configuration, logging, the model layer and UUID assignment.
 *
 * Usage:
 *   imports: [UuidModelModule.forRoot()]
 */
@Module({})
export class UuidModelModule {
  static forRoot(options: UuidModuleOptions = {}): DynamicModule {
    return {
      module: UuidModelModule,
      imports: [
        ConfigModule.forRoot({ isGlobal: true }),
        LoggingModule,
        ModelModule.register(),
        UuidModule.forRoot(options),
      ],
      exports: [UuidModule],
    };
  }
}
