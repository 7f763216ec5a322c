import type { AttributeValue, ModelDefinition } from '../models/model-record.model';

export interface EqualityPredicate {
  field: string;
  value: AttributeValue;
}

/**
 * RecordQuery — equality-only query builder bound to a single table.
 *
 * Repositories read `predicates` and AND them together.
 *
 * Usage:
 *   new RecordQuery('posts').where('status', 'draft').where('author_id', 7)
 */
export class RecordQuery {
  private readonly filters: EqualityPredicate[] = [];

  constructor(readonly table: string) {}

  where(field: string, value: AttributeValue): this {
    this.filters.push({ field, value });
    return this;
  }

  get predicates(): ReadonlyArray<EqualityPredicate> {
    return this.filters;
  }
}

/** A RecordQuery that also carries the model definition, so results can be hydrated. */
export class ModelQuery extends RecordQuery {
  constructor(readonly model: ModelDefinition) {
    super(model.table);
  }
}
