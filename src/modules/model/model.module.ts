import { Module, type DynamicModule } from '@nestjs/common';
import { RepositoryModule } from '../../infrastructure/repositories/repository.module';
import { LoggingModule } from '../logging/logging.module';
import { AttributeCaster } from './attribute-caster';
import { ModelLifecycle } from './model-lifecycle.service';
import { ModelService } from './model.service';

/**
 * ModelModule — the host model layer: lifecycle registry, default caster and
 * ModelService over the repository selected by RepositoryModule.register().
 */
@Module({})
export class ModelModule {
  static register(): DynamicModule {
    return {
      module: ModelModule,
      global: true,
      imports: [LoggingModule, RepositoryModule.register()],
      providers: [AttributeCaster, ModelLifecycle, ModelService],
      exports: [ModelLifecycle, ModelService],
    };
  }
}
