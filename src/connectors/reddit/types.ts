import { z } from 'zod';

export const RedditThingSchema = z.object({
  kind: z.string(),
  data: z.record(z.unknown()),
});

/**
 * Reddit API response for listing endpoints
 */
export const RedditListingSchema = z.object({
  kind: z.literal('Listing'),
  data: z.object({
    after: z.string().nullable(),
    before: z.string().nullable().optional(),
    children: z.array(RedditThingSchema),
  }),
});

export const RedditSubredditSchema = z.object({
  display_name: z.string().min(1),
});

/**
 * Response of /api/v1/me/friends; older deployments wrap it in a one-element array
 */
export const RedditUserListSchema = z.object({
  kind: z.literal('UserList'),
  data: z.object({
    children: z.array(
      z.object({
        name: z.string().min(1),
        id: z.string().optional(),
        date: z.number().optional(),
      })
    ),
  }),
});

export const RedditFriendsResponseSchema = z.union([
  RedditUserListSchema,
  z.array(RedditUserListSchema).min(1),
]);

export const RedditMeSchema = z.object({
  name: z.string().min(1),
});

export const RedditPreferencesSchema = z.record(z.unknown());

export type RedditThing = z.infer<typeof RedditThingSchema>;
export type RedditListing = z.infer<typeof RedditListingSchema>;
export type RedditUserList = z.infer<typeof RedditUserListSchema>;

export interface RedditClientOptions {
  /** Defaults to https://oauth.reddit.com */
  baseUrl?: string;
  /** Items per listing page (Reddit max is 100) */
  pageSize?: number;
}
