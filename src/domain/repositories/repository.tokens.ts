/**
 * NestJS injection tokens for repository interfaces.
 *
 * Usage:
 *   @Inject(RECORD_REPOSITORY) private readonly records: IRecordRepository
 */
export const RECORD_REPOSITORY = 'RECORD_REPOSITORY';
