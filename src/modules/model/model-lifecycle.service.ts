import { Injectable } from '@nestjs/common';
import type { AttributeValue, ModelDefinition, ModelRecord } from '../../domain/models/model-record.model';
import { AttributeCaster } from './attribute-caster';
import { ModelLogger } from '../logging/model-logger.service';
import { LogCategory } from '../logging/log-levels';

/** Runs immediately before a new record is written. Throwing aborts the insert. */
export type CreatingHook = (record: ModelRecord) => void;

export type AttributeReadNext = (key: string, value: AttributeValue) => unknown;

/**
 * Attribute-read override. Return a value to take over the read, or call
 * `next` to hand the attribute to the next reader (finally the default caster).
 */
export type AttributeReader = (
  model: ModelDefinition,
  key: string,
  value: AttributeValue,
  next: AttributeReadNext,
) => unknown;

/**
 * ModelLifecycle — explicit registry for the callbacks the model layer runs.
 *
 * Registration returns an unregister function:
 *   const off = lifecycle.onCreating((record) => { ... });
 *   off();
 */
@Injectable()
export class ModelLifecycle {
  private readonly creatingHooks: CreatingHook[] = [];
  private readonly attributeReaders: AttributeReader[] = [];

  constructor(
    private readonly caster: AttributeCaster,
    private readonly logger: ModelLogger,
  ) {}

  onCreating(hook: CreatingHook): () => void {
    this.creatingHooks.push(hook);
    this.logger.debug(LogCategory.MODEL, 'Creating hook registered', { hooks: this.creatingHooks.length });
    return () => removeFrom(this.creatingHooks, hook);
  }

  /** Readers run in registration order; the first registered sees the value first. */
  onReadAttribute(reader: AttributeReader): () => void {
    this.attributeReaders.push(reader);
    this.logger.debug(LogCategory.MODEL, 'Attribute reader registered', { readers: this.attributeReaders.length });
    return () => removeFrom(this.attributeReaders, reader);
  }

  fireCreating(record: ModelRecord): void {
    for (const hook of [...this.creatingHooks]) {
      hook(record);
    }
  }

  readAttribute(model: ModelDefinition, key: string, value: AttributeValue): unknown {
    const readers = [...this.attributeReaders];
    const step = (index: number, k: string, v: AttributeValue): unknown => {
      if (index >= readers.length) return this.caster.cast(model, k, v);
      return readers[index](model, k, v, (nextKey, nextValue) => step(index + 1, nextKey, nextValue));
    };
    return step(0, key, value);
  }
}

function removeFrom<T>(list: T[], item: T): void {
  const index = list.indexOf(item);
  if (index !== -1) list.splice(index, 1);
}
