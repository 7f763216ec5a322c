import { Injectable } from '@nestjs/common';
import type { ModelDefinition, ModelRecord } from '../../domain/models/model-record.model';
import { isValidUuid } from '../../domain/uuid/uuid-guard';
import { ModelService } from '../model/model.service';
import { ModelLogger } from '../logging/model-logger.service';
import { LogCategory } from '../logging/log-levels';
import { UuidAssigner } from './uuid-assigner.service';

@Injectable()
export class UuidLookupService {
  constructor(
    private readonly models: ModelService,
    private readonly assigner: UuidAssigner,
    private readonly logger: ModelLogger,
  ) {}

  /** First record whose uuid matches, or null. Malformed input is "not found" and never queried. */
  async findByUuid(model: ModelDefinition, uuid: string): Promise<ModelRecord | null> {
    if (!isValidUuid(uuid)) {
      this.logger.debug(LogCategory.UUID, 'Skipping look-up of malformed uuid', { table: model.table, uuid });
      return null;
    }
    return this.models.first(this.assigner.whereUuid(model, this.models.query(model), uuid));
  }
}
