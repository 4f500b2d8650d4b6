/**
 * Content
 */

import { toIsoString } from './timestamps.js';

export type ContentRow = {
  id: string;
  body: string;
  created_at: Date;
  updated_at: Date;
  author_id: string | null;
};

export interface ContentResponse {
  id: string;
  body: string;
  created_at: string;
  updated_at: string;
  author_id: string | null;
}

export interface NewContent {
  body: string;
  author_id?: string | null;
}

export interface ContentUpdate {
  body: string;
}

export function toContentResponse(row: ContentRow): ContentResponse {
  return {
    id: row.id,
    body: row.body,
    created_at: toIsoString(row.created_at),
    updated_at: toIsoString(row.updated_at),
    author_id: row.author_id,
  };
}
