import { describe, it, expect, beforeEach } from 'vitest';
import { RawOutputRepository } from '../../../src/db/repository/raw-output-repository.js';
import { createTestDb } from '../../helpers.js';

describe('RawOutputRepository', () => {
  let repo: RawOutputRepository;

  beforeEach(() => {
    repo = new RawOutputRepository(createTestDb());
  });

  it('insert → findBySha256 でバイト数と内容が返る', () => {
    const content = Buffer.from('a.example.com\nß.example.com\n', 'utf8');
    repo.insert('h1', content, '2026-01-01T00:00:00.000Z');

    expect(repo.findBySha256('h1')).toEqual({
      sha256: 'h1',
      content: 'a.example.com\nß.example.com\n',
      sizeBytes: 29,
      createdAt: '2026-01-01T00:00:00.000Z',
    });
  });

  it('同じハッシュの再挿入は無視される', () => {
    repo.insert('h1', Buffer.from('first'), '2026-01-01T00:00:00.000Z');
    repo.insert('h1', Buffer.from('second'), '2026-01-02T00:00:00.000Z');

    expect(repo.findBySha256('h1')?.content).toBe('first');
  });

  it('存在しないハッシュは undefined', () => {
    expect(repo.findBySha256('missing')).toBeUndefined();
  });
});
