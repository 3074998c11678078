/**
 * Platform constants: hosts, endpoint paths, request headers and page sizes.
 */

export const PLATFORM_BASE_URL = 'https://www.zhihu.com';
export const PLATFORM_COLUMN_URL = 'https://zhuanlan.zhihu.com';

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/123.0.0.0 Safari/537.36';

export const BASE_HEADERS: Readonly<Record<string, string>> = {
  accept: '*/*',
  'accept-language': 'zh-CN,zh;q=0.9',
  priority: 'u=1, i',
  referer: `${PLATFORM_BASE_URL}/search?q=python&time_interval=a_year&type=content`,
  'x-api-version': '3.0.91',
  'x-app-za': 'OS=Web',
  'x-requested-with': 'fetch',
  'x-zse-93': '101_3_3.0',
};

export const API_PATHS = {
  me: '/api/v4/me',
  search: '/api/v4/search_v3',
  rootComments: (contentType: string, contentId: string) =>
    `/api/v4/comment_v5/${contentType}s/${contentId}/root_comment`,
  childComments: (rootCommentId: string) => `/api/v4/comment_v5/comment/${rootCommentId}/child_comment`,
  creatorContent: (urlToken: string, kind: CreatorContentKind) => `/api/v4/members/${urlToken}/${kind}`,
  questionFeeds: (questionId: string) => `/api/v4/questions/${questionId}/feeds`,
  homefeed: '/api/v3/feed/topstory/recommend',
} as const;

export type CreatorContentKind = 'answers' | 'articles' | 'zvideos';

/** Paths on the article-column host start with this prefix */
export const COLUMN_PATH_PREFIX = '/p/';

export const PAGE_SIZES = {
  search: 20,
  comments: 10,
  creatorContent: 20,
  questionAnswers: 5,
} as const;

export const ME_INCLUDE = 'email,is_active,is_bind_phone';

export const CREATOR_INCLUDES: Readonly<Record<CreatorContentKind, string>> = {
  answers:
    'data[*].is_normal,admin_closed_comment,reward_info,is_collapsed,annotation_action,annotation_detail,collapse_reason,collapsed_by,suggest_edit,comment_count,can_comment,content,editable_content,attachment,voteup_count,reshipment_settings,comment_permission,created_time,updated_time,review_info,excerpt,paid_info,reaction_instruction,is_labeled,label_info,relationship.is_authorized,voting,is_author,is_thanked,is_nothelp;data[*].vessay_info;data[*].author.badge[?(type=best_answerer)].topics;data[*].author.vip_info;data[*].question.has_publishing_draft,relationship',
  articles:
    'data[*].comment_count,suggest_edit,is_normal,thumbnail_extra_info,thumbnail,can_comment,comment_permission,admin_closed_comment,content,voteup_count,created,updated,upvoted_followees,voting,review_info,reaction_instruction,is_labeled,label_info;data[*].vessay_info;data[*].author.badge[?(type=best_answerer)].topics;data[*].author.vip_info;',
  zvideos: 'similar_zvideo,creation_relationship,reaction_instruction',
};

export const QUESTION_FEED_INCLUDE =
  'data[*].is_normal,admin_closed_comment,reward_info,is_collapsed,annotation_action,annotation_detail,collapse_reason,is_sticky,collapsed_by,suggest_edit,comment_count,can_comment,content,editable_content,attachment,voteup_count,reshipment_settings,comment_permission,created_time,updated_time,review_info,relevant_info,question,excerpt,is_labeled,paid_info,paid_info_content,reaction_instruction,relationship.is_authorized,is_author,voting,is_thanked,is_nothelp;data[*].author.follower_count,vip_info,kvip_info,badge[*].topics;data[*].settings.table_of_content.enabled';

/**
 * Parameters carried from a question feed's `paging.next` URL into the next
 * request. Anything else in that URL is dropped.
 */
export const QUESTION_FEED_CURSOR_PARAMS = ['cursor', 'session_id', 'offset', 'limit', 'order'] as const;

export const SEARCH_SORT = {
  default: '',
  upvoted: 'upvoted_count',
  created: 'created_time',
} as const;

export const SEARCH_TYPE = {
  default: '',
  answer: 'answer',
  article: 'article',
  zvideo: 'zvideo',
} as const;

export const SEARCH_TIME = {
  default: '',
  day: 'a_day',
  week: 'a_week',
  month: 'a_month',
  threeMonths: 'three_months',
  halfYear: 'half_a_year',
  year: 'a_year',
} as const;

export type SearchSort = keyof typeof SEARCH_SORT;
export type SearchType = keyof typeof SEARCH_TYPE;
export type SearchTime = keyof typeof SEARCH_TIME;
