import { ModelService } from './model.service';
import { ModelLifecycle } from './model-lifecycle.service';
import { AttributeCaster } from './attribute-caster';
import { ModelLogger } from '../logging/model-logger.service';
import { LogCategory, LogLevel } from '../logging/log-levels';
import { InMemoryRecordRepository } from '../../infrastructure/repositories/inmemory/inmemory-record.repository';
import { ModelPersistenceError } from '../../domain/models/model-persistence.error';
import type { ModelDefinition } from '../../domain/models/model-record.model';

const posts: ModelDefinition = { table: 'posts', casts: { views: 'integer', published: 'boolean' } };

describe('ModelService', () => {
  let repo: InMemoryRecordRepository;
  let lifecycle: ModelLifecycle;
  let logger: ModelLogger;
  let service: ModelService;

  beforeEach(() => {
    logger = new ModelLogger();
    logger.updateConfig({ globalLevel: LogLevel.DEBUG, categoryLevels: {} });
    jest.spyOn(console, 'debug').mockImplementation();
    jest.spyOn(console, 'warn').mockImplementation();
    repo = new InMemoryRecordRepository();
    lifecycle = new ModelLifecycle(new AttributeCaster(), logger);
    service = new ModelService(repo, lifecycle, logger);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('make', () => {
    it('should build an unsaved record with copied attributes', () => {
      const attributes = { title: 'Hello' };
      const record = service.make(posts, attributes);
      record.attributes.title = 'Changed';

      expect(record.exists).toBe(false);
      expect(record.model).toBe(posts);
      expect(attributes.title).toBe('Hello');
    });
  });

  describe('create / insert', () => {
    it('should persist the record and mark it as existing', async () => {
      const record = await service.create(posts, { title: 'Hello', views: 1 });

      expect(record.exists).toBe(true);
      const rows = await repo.findAll(service.query(posts));
      expect(rows).toEqual([{ title: 'Hello', views: 1 }]);
    });

    it('should run creating hooks before persisting', async () => {
      lifecycle.onCreating((record) => {
        record.attributes.slug = String(record.attributes.title).toLowerCase();
      });
      const record = await service.create(posts, { title: 'Hello' });

      expect(record.attributes.slug).toBe('hello');
      const [row] = await repo.findAll(service.query(posts));
      expect(row.slug).toBe('hello');
    });

    it('should not persist when a hook throws', async () => {
      lifecycle.onCreating(() => {
        throw new TypeError('Invalid UUID');
      });

      await expect(service.create(posts, { title: 'Hello' })).rejects.toThrow('Invalid UUID');
      expect(await repo.findAll(service.query(posts))).toEqual([]);
    });

    it('should log a rejected record at WARN', async () => {
      lifecycle.onCreating(() => {
        throw new TypeError('Invalid UUID');
      });
      await expect(service.create(posts)).rejects.toThrow(TypeError);

      const [entry] = logger.getRecentLogs({ level: LogLevel.WARN, category: LogCategory.MODEL });
      expect(entry.message).toBe('Creating hook rejected record');
      expect(entry.data).toEqual({ table: 'posts', reason: 'Invalid UUID' });
    });

    it('should log a failed repository write at ERROR and rethrow', async () => {
      jest.spyOn(repo, 'insert').mockRejectedValue(new Error('disk full'));

      const record = service.make(posts, { title: 'Hello' });
      await expect(service.insert(record)).rejects.toThrow('disk full');
      expect(record.exists).toBe(false);

      const [entry] = logger.getRecentLogs({ level: LogLevel.ERROR, category: LogCategory.REPOSITORY });
      expect(entry.message).toBe('Record insert failed');
      expect(entry.data).toEqual({ table: 'posts' });
      expect(entry.error?.message).toBe('disk full');
    });

    it('should refuse to insert a record twice', async () => {
      const record = await service.create(posts, { title: 'Hello' });
      await expect(service.insert(record)).rejects.toThrow(ModelPersistenceError);
    });

    it('should not fire hooks for an already inserted record', async () => {
      const record = await service.create(posts);
      const hook = jest.fn();
      lifecycle.onCreating(hook);
      await expect(service.insert(record)).rejects.toThrow('Record in posts has already been inserted');
      expect(hook).not.toHaveBeenCalled();
    });
  });

  describe('query / get / first', () => {
    beforeEach(async () => {
      await service.create(posts, { title: 'A', status: 'draft' });
      await service.create(posts, { title: 'B', status: 'live' });
      await service.create(posts, { title: 'C', status: 'draft' });
    });

    it('should return hydrated records matching every predicate', async () => {
      const records = await service.get(service.query(posts).where('status', 'draft'));
      expect(records.map((r) => r.attributes.title)).toEqual(['A', 'C']);
      expect(records.every((r) => r.exists && r.model === posts)).toBe(true);
    });

    it('should return the first match', async () => {
      const record = await service.first(service.query(posts).where('status', 'live'));
      expect(record?.attributes.title).toBe('B');
    });

    it('should log a failed query at ERROR and rethrow', async () => {
      jest.spyOn(repo, 'findAll').mockRejectedValue(new Error('unavailable'));

      await expect(service.get(service.query(posts))).rejects.toThrow('unavailable');
      const [entry] = logger.getRecentLogs({ level: LogLevel.ERROR, category: LogCategory.REPOSITORY });
      expect(entry.message).toBe('Query failed');
      expect(entry.data).toEqual({ table: 'posts' });
    });

    it('should return null when nothing matches', async () => {
      expect(await service.first(service.query(posts).where('status', 'archived'))).toBeNull();
    });
  });

  describe('getAttribute / toObject', () => {
    it('should read attributes through the default caster', async () => {
      const record = await service.create(posts, { views: '12', published: 1, title: 'Hi' });
      expect(service.getAttribute(record, 'views')).toBe(12);
      expect(service.toObject(record)).toEqual({ views: 12, published: true, title: 'Hi' });
    });

    it('should read a missing attribute as null', async () => {
      const record = await service.create(posts);
      expect(service.getAttribute(record, 'missing')).toBeNull();
    });

    it('should apply registered readers', async () => {
      lifecycle.onReadAttribute((_m, key, value, next) => (key === 'title' ? 'masked' : next(key, value)));
      const record = await service.create(posts, { title: 'Hi' });
      expect(service.getAttribute(record, 'title')).toBe('masked');
    });
  });
});
