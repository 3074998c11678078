/**
 * Page decoding: raw API JSON → ContentItem / CommentItem.
 *
 * Records that do not decode are skipped (and counted in the debug log); a page
 * without a `data` array is a protocol error.
 */

import { z } from 'zod';
import { COLUMN_PATH_PREFIX, PLATFORM_BASE_URL, PLATFORM_COLUMN_URL } from '../config/constants';
import { createModuleLogger } from '../utils/logger';
import { CrawlErrors } from './errors';
import type { CommentItem, ContentItem, ContentRef, JsonObject, JsonValue } from './types';

const log = createModuleLogger('Extractor');

const idSchema = z.union([z.string().min(1), z.number()]).transform((id) => String(id));

const authorSchema = z.object({
  name: z.string().optional(),
  url_token: z.string().optional(),
});

const rawContentSchema = z.object({
  id: idSchema,
  type: z.enum(['answer', 'article', 'zvideo']),
  title: z.string().optional(),
  excerpt: z.string().optional(),
  description: z.string().optional(),
  voteup_count: z.number().optional(),
  comment_count: z.number().optional(),
  created_time: z.number().optional(),
  updated_time: z.number().optional(),
  created: z.number().optional(),
  updated: z.number().optional(),
  published_at: z.number().optional(),
  author: authorSchema.optional(),
  question: z
    .object({
      id: idSchema,
      title: z.string().optional(),
      name: z.string().optional(),
    })
    .optional(),
});

type RawContent = z.infer<typeof rawContentSchema>;

const searchEntrySchema = z.object({
  type: z.literal('search_result'),
  object: rawContentSchema,
});

const feedEntrySchema = z.object({
  target: rawContentSchema,
});

const rawCommentSchema = z.object({
  id: idSchema,
  content: z.string(),
  created_time: z.number().optional(),
  like_count: z.number().optional(),
  child_comment_count: z.number().optional(),
  author: authorSchema.optional(),
  comment_tag: z.array(z.object({ type: z.string(), text: z.string().optional() })).optional(),
});

type RawComment = z.infer<typeof rawCommentSchema>;

export function stripTags(text: string): string {
  return text.replace(/<[^>]+>/g, '');
}

export function contentUrl(type: RawContent['type'], id: string, questionId?: string): string {
  switch (type) {
    case 'answer':
      return questionId
        ? `${PLATFORM_BASE_URL}/question/${questionId}/answer/${id}`
        : `${PLATFORM_BASE_URL}/answer/${id}`;
    case 'article':
      return `${PLATFORM_COLUMN_URL}${COLUMN_PATH_PREFIX}${id}`;
    case 'zvideo':
      return `${PLATFORM_BASE_URL}/zvideo/${id}`;
  }
}

function requireData(page: JsonObject, what: string): JsonValue[] {
  const data = page.data;
  if (!Array.isArray(data)) {
    throw CrawlErrors.protocolError(`${what} page has no data array`);
  }
  return data;
}

function decodeAll<R, T>(entries: JsonValue[], schema: z.ZodType<R, z.ZodTypeDef, unknown>, map: (raw: R) => T, what: string): T[] {
  const items: T[] = [];
  let skipped = 0;
  for (const entry of entries) {
    const parsed = schema.safeParse(entry);
    if (parsed.success) {
      items.push(map(parsed.data));
    } else {
      skipped++;
    }
  }
  if (skipped > 0) {
    log.debug(`Skipped ${skipped}/${entries.length} ${what} records that did not decode`);
  }
  return items;
}

function toContentItem(raw: RawContent): ContentItem {
  const questionId = raw.question?.id;
  const title = raw.title ?? raw.question?.title ?? raw.question?.name ?? '';
  const item: ContentItem = {
    contentId: raw.id,
    contentType: raw.type,
    title: stripTags(title),
    excerpt: stripTags(raw.excerpt ?? raw.description ?? ''),
    url: contentUrl(raw.type, raw.id, questionId),
    authorName: raw.author?.name ?? '',
    authorUrlToken: raw.author?.url_token ?? '',
    voteupCount: raw.voteup_count ?? 0,
    commentCount: raw.comment_count ?? 0,
    createdTime: raw.created_time ?? raw.created ?? raw.published_at ?? 0,
    updatedTime: raw.updated_time ?? raw.updated ?? raw.created_time ?? raw.created ?? raw.published_at ?? 0,
  };
  if (questionId) item.questionId = questionId;
  return item;
}

/** `search_v3` pages: only `search_result` entries carry content */
export function extractSearchContents(page: JsonObject): ContentItem[] {
  return decodeAll(requireData(page, 'search'), searchEntrySchema, (entry) => toContentItem(entry.object), 'search');
}

/** A creator's answers, articles or videos */
export function extractCreatorContents(page: JsonObject): ContentItem[] {
  return decodeAll(requireData(page, 'creator'), rawContentSchema, toContentItem, 'creator');
}

/** Question feed pages wrap each answer in `target` */
export function extractQuestionAnswers(page: JsonObject): ContentItem[] {
  return decodeAll(
    requireData(page, 'question feed'),
    feedEntrySchema,
    (entry) => toContentItem(entry.target),
    'question feed',
  );
}

export function extractComments(
  page: JsonObject,
  content: ContentRef,
  parentCommentId: string | null,
): CommentItem[] {
  const toCommentItem = (raw: RawComment): CommentItem => ({
    commentId: raw.id,
    parentCommentId,
    contentId: content.contentId,
    contentType: content.contentType,
    content: stripTags(raw.content),
    authorName: raw.author?.name ?? '',
    authorUrlToken: raw.author?.url_token ?? '',
    likeCount: raw.like_count ?? 0,
    subCommentCount: raw.child_comment_count ?? 0,
    publishTime: raw.created_time ?? 0,
    ipLocation: raw.comment_tag?.find((tag) => tag.type === 'ip_info')?.text ?? '',
  });

  return decodeAll(requireData(page, 'comment'), rawCommentSchema, toCommentItem, 'comment');
}
