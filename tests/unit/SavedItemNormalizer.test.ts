// tests/unit/SavedItemNormalizer.test.ts

import { describe, it, expect } from 'vitest';
import { SavedItemNormalizer } from '../../src/core/normalizer/SavedItemNormalizer';
import { savedItemKey, toFullname } from '../../src/core/normalizer/types';
import { UnexpectedTypeError } from '../../src/utils/errors';

describe('SavedItemNormalizer', () => {
  const normalizer = new SavedItemNormalizer();

  const link = {
    kind: 't3',
    data: {
      id: 'abc123',
      title: 'A saved post',
      subreddit: 'typescript',
      permalink: '/r/typescript/comments/abc123/a_saved_post/',
      author: 'poster',
      created_utc: 1700000000,
      over_18: false,
      url: 'https://example.com/post',
      score: 42,
    },
  };

  const reply = {
    kind: 't1',
    data: {
      id: 'def456',
      body: 'A saved comment',
      subreddit: 'node',
      permalink: '/r/node/comments/xyz/thread/def456/',
      author: 'commenter',
      created_utc: 1700000100,
      link_id: 't3_xyz',
      link_title: 'Parent thread',
      over_18: true,
    },
  };

  it('should map a link to a submission', () => {
    expect(normalizer.normalizeOne(link)).toEqual({
      kind: 'submission',
      id: 'abc123',
      createdAt: new Date(1700000000 * 1000),
      metadata: {
        title: 'A saved post',
        subreddit: 'typescript',
        permalink: '/r/typescript/comments/abc123/a_saved_post/',
        author: 'poster',
        over18: false,
        url: 'https://example.com/post',
      },
    });
  });

  it('should map a comment, titled by its thread', () => {
    expect(normalizer.normalizeOne(reply)).toEqual({
      kind: 'comment',
      id: 'def456',
      createdAt: new Date(1700000100 * 1000),
      metadata: {
        title: 'Parent thread',
        subreddit: 'node',
        permalink: '/r/node/comments/xyz/thread/def456/',
        author: 'commenter',
        over18: true,
        linkId: 't3_xyz',
      },
    });
  });

  it('should keep listing order', () => {
    expect(normalizer.normalize([reply, link]).map(savedItemKey)).toEqual(['t1_def456', 't3_abc123']);
  });

  it('should reject kinds outside submission and comment', () => {
    const award = { kind: 't5', data: { id: 'sub1', display_name: 'pics' } };

    expect(() => normalizer.normalizeOne(award)).toThrow(UnexpectedTypeError);
    expect(() => normalizer.normalizeOne(award)).toThrow('Unexpected saved item type: t5');
  });

  it('should reject a link missing required fields', () => {
    expect(() => normalizer.normalizeOne({ kind: 't3', data: { id: 'abc' } })).toThrow(
      /^Schema validation failed for t3: /
    );
  });

  it('should build Reddit fullnames', () => {
    expect(toFullname('submission', 'abc')).toBe('t3_abc');
    expect(toFullname('comment', 'def')).toBe('t1_def');
  });
});
