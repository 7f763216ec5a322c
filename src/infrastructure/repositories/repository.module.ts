/**
 * RepositoryModule — dynamic module that provides IRecordRepository.
 *
 * Selects the persistence backend via the PERSISTENCE_BACKEND environment variable:
 *   - "inmemory" (default) → InMemoryRecordRepository
 *
 * Any other value fails at registration. Applications with their own store
 * bind RECORD_REPOSITORY to an IRecordRepository of their own instead.
 *
 * Usage:
 *   imports: [RepositoryModule.register()]
 */
import { Module, type DynamicModule } from '@nestjs/common';
import { RECORD_REPOSITORY } from '../../domain/repositories/repository.tokens';
import { InMemoryRecordRepository } from './inmemory/inmemory-record.repository';

export const PERSISTENCE_BACKENDS = ['inmemory'] as const;

@Module({})
export class RepositoryModule {
  static register(): DynamicModule {
    const backend = (process.env.PERSISTENCE_BACKEND ?? 'inmemory').trim().toLowerCase();

    if (!(PERSISTENCE_BACKENDS as readonly string[]).includes(backend)) {
      throw new Error(
        `Unsupported PERSISTENCE_BACKEND ${JSON.stringify(backend)}; expected one of: ${PERSISTENCE_BACKENDS.join(', ')}`,
      );
    }

    return {
      module: RepositoryModule,
      global: true,
      providers: [{ provide: RECORD_REPOSITORY, useClass: InMemoryRecordRepository }],
      exports: [RECORD_REPOSITORY],
    };
  }
}
