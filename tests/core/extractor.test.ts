import { ErrorCode } from '../../core/errors';
import type { JsonObject } from '../../core/types';
import {
  contentUrl,
  extractComments,
  extractCreatorContents,
  extractQuestionAnswers,
  extractSearchContents,
  stripTags,
} from '../../core/extractor';

describe('extractor', () => {
  describe('extractSearchContents', () => {
    it('should decode search results and skip other entry types', () => {
      const page: JsonObject = {
        data: [
          {
            type: 'search_result',
            object: {
              id: 11,
              type: 'answer',
              excerpt: '<em>hello</em> world',
              voteup_count: 5,
              comment_count: 2,
              created_time: 100,
              updated_time: 200,
              author: { name: 'alice', url_token: 'alice-t' },
              question: { id: '7', name: 'What is <em>hello</em>?' },
            },
          },
          { type: 'relevant_query', query_list: [] },
          {
            type: 'search_result',
            object: { id: 'a1', type: 'article', title: 'Art', excerpt: 'x', created: 300, updated: 400, author: { name: 'bob' } },
          },
        ],
        paging: { is_end: false },
      };

      expect(extractSearchContents(page)).toEqual([
        {
          contentId: '11',
          contentType: 'answer',
          title: 'What is hello?',
          excerpt: 'hello world',
          url: 'https://www.zhihu.com/question/7/answer/11',
          authorName: 'alice',
          authorUrlToken: 'alice-t',
          voteupCount: 5,
          commentCount: 2,
          createdTime: 100,
          updatedTime: 200,
          questionId: '7',
        },
        {
          contentId: 'a1',
          contentType: 'article',
          title: 'Art',
          excerpt: 'x',
          url: 'https://zhuanlan.zhihu.com/p/a1',
          authorName: 'bob',
          authorUrlToken: '',
          voteupCount: 0,
          commentCount: 0,
          createdTime: 300,
          updatedTime: 400,
        },
      ]);
    });

    it('should treat a page without a data array as a protocol error', () => {
      expect(() => extractSearchContents({ paging: { is_end: true } })).toThrow(
        expect.objectContaining({ code: ErrorCode.PROTOCOL_ERROR }),
      );
    });
  });

  describe('extractQuestionAnswers', () => {
    it('should unwrap feed targets', () => {
      const page: JsonObject = {
        data: [
          {
            target_type: 'answer',
            target: {
              id: '5',
              type: 'answer',
              excerpt: 'e',
              question: { id: '42', title: 'Q' },
              author: { name: 'carol', url_token: 'carol-t' },
              voteup_count: 1,
              comment_count: 0,
              created_time: 1,
              updated_time: 2,
            },
          },
          { target_type: 'advert' },
        ],
      };

      const answers = extractQuestionAnswers(page);

      expect(answers).toHaveLength(1);
      expect(answers[0]).toMatchObject({
        contentId: '5',
        title: 'Q',
        questionId: '42',
        url: 'https://www.zhihu.com/question/42/answer/5',
      });
    });
  });

  describe('extractCreatorContents', () => {
    it('should fall back to description and published_at for videos', () => {
      const page = {
        data: [{ id: 'v1', type: 'zvideo', title: 'Vid', description: 'desc', published_at: 50, author: { name: 'dan' } }],
      };

      expect(extractCreatorContents(page)).toEqual([
        {
          contentId: 'v1',
          contentType: 'zvideo',
          title: 'Vid',
          excerpt: 'desc',
          url: 'https://www.zhihu.com/zvideo/v1',
          authorName: 'dan',
          authorUrlToken: '',
          voteupCount: 0,
          commentCount: 0,
          createdTime: 50,
          updatedTime: 50,
        },
      ]);
    });
  });

  describe('extractComments', () => {
    it('should decode comments and skip records that do not decode', () => {
      const page: JsonObject = {
        data: [
          { id: 'c1', content: 'hi <b>there</b>', like_count: 4, child_comment_count: 0, created_time: 9 },
          { id: 'c2' },
        ],
      };

      expect(extractComments(page, { contentId: '1', contentType: 'article' }, 'root-1')).toEqual([
        {
          commentId: 'c1',
          parentCommentId: 'root-1',
          contentId: '1',
          contentType: 'article',
          content: 'hi there',
          authorName: '',
          authorUrlToken: '',
          likeCount: 4,
          subCommentCount: 0,
          publishTime: 9,
          ipLocation: '',
        },
      ]);
    });
  });

  describe('helpers', () => {
    it('should strip markup', () => {
      expect(stripTags('<em>a</em> & <br/>b')).toBe('a & b');
    });

    it('should build answer urls without a question', () => {
      expect(contentUrl('answer', '9')).toBe('https://www.zhihu.com/answer/9');
    });
  });
});
