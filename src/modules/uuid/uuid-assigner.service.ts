/**
 * UuidAssigner — gives every new record a `uuid` attribute.
 *
 * - beforeInsert():  creating hook; normalizes a caller-supplied uuid or
 *                    generates one, then stores it as bytes or string
 *                    depending on the model's `uuid` cast.
 * - whereUuid():     equality filter on `uuid` in the stored representation.
 * - castAttribute(): attribute-read override decoding stored bytes.
 *
 * Registered with ModelLifecycle by UuidModule.
 */
import { Inject, Injectable } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import {
  hasBinaryCast,
  type AttributeValue,
  type Attributes,
  type ModelDefinition,
  type ModelRecord,
} from '../../domain/models/model-record.model';
import type { RecordQuery } from '../../domain/repositories/record-query';
import {
  DEFAULT_UUID_VERSION,
  UuidDecodeError,
  generateUuid,
  isUuidVersion,
  normalizeUuid,
  uuidFromBytes,
  uuidToBytes,
  type NameBasedInput,
  type UuidVersion,
} from '../../domain/uuid/uuid-codec';
import type { AttributeReadNext } from '../model/model-lifecycle.service';
import { ModelLogger } from '../logging/model-logger.service';
import { LogCategory } from '../logging/log-levels';
import { UUID_OPTIONS, type UuidOptions } from './uuid.options';

export const UUID_FIELD = 'uuid';

@Injectable()
export class UuidAssigner {
  constructor(
    @Inject(UUID_OPTIONS) private readonly options: UuidOptions,
    private readonly logger: ModelLogger,
  ) {}

  /** The model's `uuidVersion` when supported, otherwise uuid4. */
  resolveVersion(model: ModelDefinition): UuidVersion {
    if (isUuidVersion(model.uuidVersion)) {
      return model.uuidVersion;
    }
    if (model.uuidVersion !== undefined) {
      this.logger.debug(LogCategory.UUID, 'Unsupported uuid version, using default', {
        table: model.table,
        configured: model.uuidVersion,
        version: DEFAULT_UUID_VERSION,
      });
    }
    return DEFAULT_UUID_VERSION;
  }

  beforeInsert(record: ModelRecord): void {
    const { model, attributes } = record;
    const version = this.resolveVersion(model);
    const supplied = attributes[UUID_FIELD];

    let uuid: string;
    if (supplied === null || supplied === undefined) {
      uuid = generateUuid(version, () => this.nameInput(model, attributes));
      this.logger.debug(LogCategory.UUID, 'Generated uuid', { table: model.table, version, uuid });
    } else {
      // Throws TypeError('Invalid UUID') outside v1-v5; the insert is aborted.
      uuid = normalizeUuid(Buffer.isBuffer(supplied) ? uuidFromBytes(supplied) : String(supplied));
    }

    attributes[UUID_FIELD] = hasBinaryCast(model, UUID_FIELD) ? uuidToBytes(uuid) : uuid;
  }

  /**
   * Add `uuid = <value>` to the query, encoded the way the model stores it.
   * String-stored models compare the value exactly as given.
   */
  whereUuid<Q extends RecordQuery>(model: ModelDefinition, query: Q, uuid: string): Q {
    if (hasBinaryCast(model, UUID_FIELD)) {
      return query.where(UUID_FIELD, uuidToBytes(uuid.toLowerCase()));
    }
    return query.where(UUID_FIELD, uuid);
  }

  /** Attribute-read override: stored uuid bytes come back as the canonical string. */
  castAttribute(model: ModelDefinition, key: string, value: AttributeValue, next: AttributeReadNext): unknown {
    if (key !== UUID_FIELD || value === null) {
      return next(key, value);
    }
    if (Buffer.isBuffer(value)) {
      return uuidFromBytes(value);
    }
    if (hasBinaryCast(model, UUID_FIELD)) {
      throw new UuidDecodeError(`Stored ${UUID_FIELD} of ${model.table} is ${typeof value}, expected bytes`);
    }
    return next(key, value);
  }

  private nameInput(model: ModelDefinition, attributes: Readonly<Attributes>): NameBasedInput {
    return {
      namespace: model.uuidNamespace ?? this.options.namespace,
      name: model.uuidName ? model.uuidName(attributes) : `${model.table}:${uuidv4()}`,
    };
  }
}
