import 'reflect-metadata';

export * from './domain/models/model-record.model';
export * from './domain/models/model-persistence.error';
export * from './domain/repositories/record-query';
export * from './domain/repositories/record.repository.interface';
export * from './domain/repositories/repository.tokens';
export * from './domain/uuid/uuid-codec';
export * from './domain/uuid/uuid-guard';

export * from './infrastructure/repositories/repository.module';
export * from './infrastructure/repositories/inmemory/inmemory-record.repository';

export * from './modules/app/uuid-model.module';
export * from './modules/logging/log-levels';
export * from './modules/logging/logging.module';
export * from './modules/logging/model-logger.service';
export * from './modules/model/attribute-caster';
export * from './modules/model/model-lifecycle.service';
export * from './modules/model/model.module';
export * from './modules/model/model.service';
export * from './modules/uuid/uuid-assigner.service';
export * from './modules/uuid/uuid-lookup.service';
export * from './modules/uuid/uuid.module';
export * from './modules/uuid/uuid.options';
