import { Injectable } from '@nestjs/common';
import type { AttributeValue, ModelDefinition } from '../../domain/models/model-record.model';

/**
 * AttributeCaster — default conversion of a stored value into its read form,
 * driven by the model's `casts`. Attribute-read overrides registered with
 * ModelLifecycle fall through to this.
 */
@Injectable()
export class AttributeCaster {
  cast(model: ModelDefinition, key: string, value: AttributeValue): unknown {
    if (value === null) return null;

    switch (model.casts?.[key]) {
      case 'integer':
        return typeof value === 'number' ? Math.trunc(value) : Number.parseInt(String(value), 10);
      case 'boolean':
        // stores without a boolean type keep 0/1
        if (typeof value === 'number') return value !== 0;
        if (typeof value === 'string') return value === '1' || value.toLowerCase() === 'true';
        return Boolean(value);
      case 'json':
        return typeof value === 'string' ? (JSON.parse(value) as unknown) : value;
      case 'date':
        return typeof value === 'string' || typeof value === 'number' ? new Date(value) : value;
      case 'string':
        return Buffer.isBuffer(value) ? value.toString('utf8') : String(value);
      case 'binary':
        return typeof value === 'string' ? Buffer.from(value, 'utf8') : value;
      default:
        return value;
    }
  }
}
