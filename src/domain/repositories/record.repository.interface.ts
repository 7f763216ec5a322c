/**
 * IRecordRepository — persistence port for model records.
 *
 * Implementations:
 *   - InMemoryRecordRepository (bundled; testing / lightweight deployments)
 *
 * Applications backed by a database bind RECORD_REPOSITORY to their own
 * implementation.
 */
import type { Attributes } from '../models/model-record.model';
import type { RecordQuery } from './record-query';

export interface IRecordRepository {
  /** Insert one row and return the attributes as stored. */
  insert(table: string, attributes: Attributes): Promise<Attributes>;

  /** All rows of `query.table` matching every predicate, in insertion order. */
  findAll(query: RecordQuery): Promise<Attributes[]>;
}
