/**
 * ModelService — create and read model records through the persistence port.
 *
 * Inserts run every registered creating hook first; reads hand each
 * attribute through the registered attribute readers and the default caster.
 */
import { Inject, Injectable } from '@nestjs/common';
import type { IRecordRepository } from '../../domain/repositories/record.repository.interface';
import { RECORD_REPOSITORY } from '../../domain/repositories/repository.tokens';
import { ModelQuery } from '../../domain/repositories/record-query';
import type { Attributes, ModelDefinition, ModelRecord } from '../../domain/models/model-record.model';
import { ModelPersistenceError } from '../../domain/models/model-persistence.error';
import { ModelLifecycle } from './model-lifecycle.service';
import { ModelLogger } from '../logging/model-logger.service';
import { LogCategory } from '../logging/log-levels';

@Injectable()
export class ModelService {
  constructor(
    @Inject(RECORD_REPOSITORY) private readonly records: IRecordRepository,
    private readonly lifecycle: ModelLifecycle,
    private readonly logger: ModelLogger,
  ) {}

  /** Build an unsaved record. The attribute map is copied. */
  make(model: ModelDefinition, attributes: Attributes = {}): ModelRecord {
    return { model, attributes: { ...attributes }, exists: false };
  }

  async create(model: ModelDefinition, attributes: Attributes = {}): Promise<ModelRecord> {
    return this.insert(this.make(model, attributes));
  }

  async insert(record: ModelRecord): Promise<ModelRecord> {
    const { table } = record.model;
    if (record.exists) {
      throw new ModelPersistenceError(`Record in ${table} has already been inserted`, table);
    }

    try {
      this.lifecycle.fireCreating(record);
    } catch (err) {
      this.logger.warn(LogCategory.MODEL, 'Creating hook rejected record', {
        table,
        reason: err instanceof Error ? err.message : String(err),
      });
      throw err;
    }

    try {
      record.attributes = await this.records.insert(table, record.attributes);
    } catch (err) {
      this.logger.error(LogCategory.REPOSITORY, 'Record insert failed', err, { table });
      throw err;
    }
    record.exists = true;
    this.logger.debug(LogCategory.MODEL, 'Record inserted', { table, columns: Object.keys(record.attributes) });
    return record;
  }

  query(model: ModelDefinition): ModelQuery {
    return new ModelQuery(model);
  }

  async get(query: ModelQuery): Promise<ModelRecord[]> {
    let rows: Attributes[];
    try {
      rows = await this.records.findAll(query);
    } catch (err) {
      this.logger.error(LogCategory.REPOSITORY, 'Query failed', err, { table: query.table });
      throw err;
    }
    this.logger.trace(LogCategory.MODEL, 'Query executed', {
      table: query.table,
      predicates: query.predicates.map((p) => p.field),
      rows: rows.length,
    });
    return rows.map((attributes) => ({ model: query.model, attributes, exists: true }));
  }

  async first(query: ModelQuery): Promise<ModelRecord | null> {
    const [record] = await this.get(query);
    return record ?? null;
  }

  getAttribute(record: ModelRecord, key: string): unknown {
    return this.lifecycle.readAttribute(record.model, key, record.attributes[key] ?? null);
  }

  /** Every attribute in its read form. */
  toObject(record: ModelRecord): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const key of Object.keys(record.attributes)) {
      result[key] = this.getAttribute(record, key);
    }
    return result;
  }
}
