/**
 * InMemoryRecordRepository — IRecordRepository backed by in-memory Maps.
 *
 * Byte values compare by content, everything else by strict equality.
 * Suitable for testing and lightweight deployments.
 */
import { Injectable } from '@nestjs/common';
import type { IRecordRepository } from '../../../domain/repositories/record.repository.interface';
import type { RecordQuery } from '../../../domain/repositories/record-query';
import type { AttributeValue, Attributes } from '../../../domain/models/model-record.model';

function copyAttributes(attributes: Attributes): Attributes {
  const copy: Attributes = {};
  for (const [key, value] of Object.entries(attributes)) {
    copy[key] = Buffer.isBuffer(value) ? Buffer.from(value) : value;
  }
  return copy;
}

function valuesEqual(stored: AttributeValue, expected: AttributeValue): boolean {
  if (Buffer.isBuffer(stored) && Buffer.isBuffer(expected)) {
    return stored.equals(expected);
  }
  return stored === expected;
}

@Injectable()
export class InMemoryRecordRepository implements IRecordRepository {
  private readonly tables: Map<string, Attributes[]> = new Map();

  async insert(table: string, attributes: Attributes): Promise<Attributes> {
    const row = copyAttributes(attributes);
    const rows = this.tables.get(table) ?? [];
    rows.push(row);
    this.tables.set(table, rows);
    return copyAttributes(row);
  }

  async findAll(query: RecordQuery): Promise<Attributes[]> {
    const rows = this.tables.get(query.table) ?? [];
    return rows
      .filter((row) => query.predicates.every((p) => valuesEqual(row[p.field] ?? null, p.value)))
      .map(copyAttributes);
  }

  /** Clear all data — useful in test teardowns. */
  clear(): void {
    this.tables.clear();
  }
}
