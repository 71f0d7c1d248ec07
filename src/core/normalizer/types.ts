// src/core/normalizer/types.ts

export type SavedItemKind = 'submission' | 'comment';

interface SavedItemBase {
  id: string; // Reddit base36 id, without the type prefix
  createdAt: Date;
  metadata: Readonly<Record<string, unknown>>;
}

export interface SavedSubmission extends SavedItemBase {
  kind: 'submission';
}

export interface SavedComment extends SavedItemBase {
  kind: 'comment';
}

/**
 * A saved submission or comment. Identity is `(kind, id)`; metadata never takes part in it.
 */
export type SavedItem = SavedSubmission | SavedComment;

const FULLNAME_PREFIX: Record<SavedItemKind, string> = {
  submission: 't3',
  comment: 't1',
};

/**
 * Reddit fullname (`t3_abc`, `t1_def`), used as the identity key of a saved item
 */
export function toFullname(kind: SavedItemKind, id: string): string {
  return `${FULLNAME_PREFIX[kind]}_${id}`;
}

export function savedItemKey(item: Pick<SavedItem, 'kind' | 'id'>): string {
  return toFullname(item.kind, item.id);
}
