import { AttributeCaster } from './attribute-caster';
import type { ModelDefinition } from '../../domain/models/model-record.model';

const model: ModelDefinition = {
  table: 'posts',
  casts: {
    views: 'integer',
    published: 'boolean',
    meta: 'json',
    created_at: 'date',
    title: 'string',
    digest: 'binary',
  },
};

describe('AttributeCaster', () => {
  const caster = new AttributeCaster();

  it('should keep null as null for every cast', () => {
    expect(caster.cast(model, 'views', null)).toBeNull();
    expect(caster.cast(model, 'meta', null)).toBeNull();
  });

  it('should return uncast attributes unchanged', () => {
    expect(caster.cast(model, 'body', 'text')).toBe('text');
    expect(caster.cast(model, 'body', 7)).toBe(7);
  });

  it('should cast integers', () => {
    expect(caster.cast(model, 'views', 3.9)).toBe(3);
    expect(caster.cast(model, 'views', '42')).toBe(42);
  });

  it('should cast 0/1 and strings to booleans', () => {
    expect(caster.cast(model, 'published', 1)).toBe(true);
    expect(caster.cast(model, 'published', 0)).toBe(false);
    expect(caster.cast(model, 'published', 'true')).toBe(true);
    expect(caster.cast(model, 'published', '0')).toBe(false);
    expect(caster.cast(model, 'published', false)).toBe(false);
  });

  it('should parse json strings', () => {
    expect(caster.cast(model, 'meta', '{"tags":["a"]}')).toEqual({ tags: ['a'] });
  });

  it('should build dates from ISO strings and epoch numbers', () => {
    expect(caster.cast(model, 'created_at', '2025-01-01T00:00:00.000Z')).toEqual(new Date('2025-01-01T00:00:00.000Z'));
    expect(caster.cast(model, 'created_at', 0)).toEqual(new Date(0));
  });

  it('should stringify values cast as string', () => {
    expect(caster.cast(model, 'title', 12)).toBe('12');
    expect(caster.cast(model, 'title', Buffer.from('hi'))).toBe('hi');
  });

  it('should keep buffers for binary casts', () => {
    const bytes = Buffer.from([1, 2, 3]);
    expect(caster.cast(model, 'digest', bytes)).toBe(bytes);
  });
});
