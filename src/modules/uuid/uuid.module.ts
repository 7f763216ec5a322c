/**
 * UuidModule — wires UuidAssigner into the model lifecycle.
 *
 * On init it registers the creating hook and the `uuid` attribute reader with
 * ModelLifecycle; on destroy it removes them again.
 *
 * Usage:
 *   imports: [ModelModule.register(), UuidModule.forRoot({ namespace: '...' })]
 */
import { Module, OnModuleDestroy, OnModuleInit, type DynamicModule } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { DEFAULT_UUID_NAMESPACE } from '../../domain/uuid/uuid-codec';
import { isValidUuid } from '../../domain/uuid/uuid-guard';
import { LoggingModule } from '../logging/logging.module';
import { ModelLifecycle } from '../model/model-lifecycle.service';
import { UuidAssigner } from './uuid-assigner.service';
import { UuidLookupService } from './uuid-lookup.service';
import { UUID_OPTIONS, type UuidModuleOptions, type UuidOptions } from './uuid.options';

export function resolveUuidOptions(options: UuidModuleOptions, config: ConfigService): UuidOptions {
  const namespace = options.namespace ?? config.get<string>('UUID_NAMESPACE') ?? DEFAULT_UUID_NAMESPACE;
  if (!isValidUuid(namespace)) {
    throw new Error(`UUID namespace must be a valid UUID, got ${JSON.stringify(namespace)}`);
  }
  return { namespace: namespace.toLowerCase() };
}

@Module({})
export class UuidModule implements OnModuleInit, OnModuleDestroy {
  private readonly unregister: Array<() => void> = [];

  constructor(
    private readonly lifecycle: ModelLifecycle,
    private readonly assigner: UuidAssigner,
  ) {}

  static forRoot(options: UuidModuleOptions = {}): DynamicModule {
    return {
      module: UuidModule,
      imports: [ConfigModule, LoggingModule],
      providers: [
        {
          provide: UUID_OPTIONS,
          inject: [ConfigService],
          useFactory: (config: ConfigService) => resolveUuidOptions(options, config),
        },
        UuidAssigner,
        UuidLookupService,
      ],
      exports: [UuidAssigner, UuidLookupService],
    };
  }

  onModuleInit(): void {
    this.unregister.push(
      this.lifecycle.onCreating((record) => this.assigner.beforeInsert(record)),
      this.lifecycle.onReadAttribute((model, key, value, next) => this.assigner.castAttribute(model, key, value, next)),
    );
  }

  onModuleDestroy(): void {
    while (this.unregister.length > 0) {
      this.unregister.pop()?.();
    }
  }
}
