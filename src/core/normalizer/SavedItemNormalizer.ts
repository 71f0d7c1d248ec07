// src/core/normalizer/SavedItemNormalizer.ts

import { z } from 'zod';
import type { SavedItem } from './types';
import type { RedditThing } from '../../connectors/reddit/types';
import { UnexpectedTypeError } from '../../utils/errors';

export const RedditSubmissionSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  subreddit: z.string(),
  permalink: z.string(),
  author: z.string().optional(),
  created_utc: z.number(),
  over_18: z.boolean().optional(),
  url: z.string().optional(),
});

export const RedditCommentSchema = z.object({
  id: z.string().min(1),
  body: z.string(),
  subreddit: z.string(),
  permalink: z.string(),
  author: z.string().optional(),
  created_utc: z.number(),
  link_id: z.string().optional(),
  link_title: z.string().optional(),
  over_18: z.boolean().optional(),
});

/**
 * Maps raw saved-listing children to the closed SavedItem union.
 *
 * Anything other than a link (t3) or comment (t1) is rejected here, at
 * construction time, so the apply phase only ever sees the two known kinds.
 */
export class SavedItemNormalizer {
  normalize(things: RedditThing[]): SavedItem[] {
    return things.map((thing) => this.normalizeOne(thing));
  }

  normalizeOne(thing: RedditThing): SavedItem {
    switch (thing.kind) {
      case 't3': {
        const post = this.parse(RedditSubmissionSchema, thing);
        return {
          kind: 'submission',
          id: post.id,
          createdAt: new Date(post.created_utc * 1000),
          metadata: {
            title: post.title,
            subreddit: post.subreddit,
            permalink: post.permalink,
            author: post.author,
            over18: post.over_18 ?? false,
            url: post.url,
          },
        };
      }
      case 't1': {
        const comment = this.parse(RedditCommentSchema, thing);
        return {
          kind: 'comment',
          id: comment.id,
          createdAt: new Date(comment.created_utc * 1000),
          metadata: {
            title: comment.link_title,
            subreddit: comment.subreddit,
            permalink: comment.permalink,
            author: comment.author,
            over18: comment.over_18 ?? false,
            linkId: comment.link_id,
          },
        };
      }
      default:
        throw new UnexpectedTypeError(`Unexpected saved item type: ${thing.kind}`, {
          kind: thing.kind,
          id: typeof thing.data.id === 'string' ? thing.data.id : undefined,
        });
    }
  }

  private parse<T extends z.ZodTypeAny>(schema: T, thing: RedditThing): z.infer<T> {
    const result = schema.safeParse(thing.data);
    if (!result.success) {
      throw new Error(
        `Schema validation failed for ${thing.kind}: ${result.error.errors
          .map((err) => `${err.path.join('.')}: ${err.message}`)
          .join(', ')}`
      );
    }
    return result.data;
  }
}
