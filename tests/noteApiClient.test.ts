import assert from 'node:assert/strict';
import { describe, test } from 'node:test';
import { FetchLike, NoteApiClient, StatsApiError, USER_AGENT } from '../src/ingestion/client/noteApiClient';
import { jsonResponse } from './helpers';

const config = {
  cookie: 'session=test-secret',
  baseUrl: 'https://stats.example.test',
  username: 'writer',
};

function fakeFetch(handler: (url: string) => Response | Promise<Response>) {
  const calls: Array<{ url: string; init: RequestInit }> = [];
  const fetchImpl: FetchLike = async (url, init) => {
    calls.push({ url, init });
    return handler(url);
  };
  return { fetchImpl, calls };
}

const statsBody = {
  data: {
    note_stats: [{ id: 11, key: 'n1', name: 'First', read_count: 10, like_count: 2, comment_count: 1 }],
    total_pv: 10,
    total_like: 2,
    total_comment: 1,
    last_page: false,
  },
};

describe('NoteApiClient.fetchPage', () => {
  test('requests the page with the session cookie and parses the envelope', async () => {
    const { fetchImpl, calls } = fakeFetch(() => jsonResponse(statsBody));
    const client = new NoteApiClient(config, { fetchImpl });

    const page = await client.fetchPage(2);

    assert.equal(calls.length, 1);
    assert.equal(calls[0].url, 'https://stats.example.test/api/v1/stats/pv?filter=all&page=2&sort=pv');
    assert.deepEqual(calls[0].init.headers, {
      Cookie: 'session=test-secret',
      'User-Agent': USER_AGENT,
      Accept: 'application/json',
    });
    assert.deepEqual(page, {
      articles: [{ id: '11', key: 'n1', title: 'First', readCount: 10, likeCount: 2, commentCount: 1 }],
      totalPv: 10,
      totalLike: 2,
      totalComment: 1,
      lastPage: false,
    });
  });

  test('treats a missing last_page flag as the final page', async () => {
    const { fetchImpl } = fakeFetch(() => jsonResponse({ data: { note_stats: [] } }));
    const page = await new NoteApiClient(config, { fetchImpl }).fetchPage(1);
    assert.equal(page.lastPage, true);
    assert.equal(page.totalPv, 0);
  });

  test('fails with an auth error on 401 and 403', async () => {
    for (const status of [401, 403]) {
      const { fetchImpl } = fakeFetch(() => jsonResponse({ error: 'unauthorized' }, status));
      await assert.rejects(
        new NoteApiClient(config, { fetchImpl }).fetchPage(1),
        (error: unknown) => error instanceof StatsApiError && error.kind === 'auth' && error.status === status
      );
    }
  });

  test('fails on other HTTP errors', async () => {
    const { fetchImpl } = fakeFetch(() => jsonResponse({}, 500));
    await assert.rejects(
      new NoteApiClient(config, { fetchImpl }).fetchPage(1),
      (error: unknown) => error instanceof StatsApiError && error.kind === 'http'
    );
  });

  test('fails when the envelope has no note_stats', async () => {
    const { fetchImpl } = fakeFetch(() => jsonResponse({ data: { notes: [] } }));
    await assert.rejects(
      new NoteApiClient(config, { fetchImpl }).fetchPage(1),
      (error: unknown) => error instanceof StatsApiError && error.kind === 'malformed'
    );
  });

  test('fails when the body is not JSON', async () => {
    const { fetchImpl } = fakeFetch(() => new Response('<html></html>', { status: 200 }));
    await assert.rejects(
      new NoteApiClient(config, { fetchImpl }).fetchPage(1),
      (error: unknown) => error instanceof StatsApiError && error.kind === 'malformed'
    );
  });

  test('wraps transport failures', async () => {
    const { fetchImpl } = fakeFetch(() => {
      throw new Error('socket hang up');
    });
    await assert.rejects(
      new NoteApiClient(config, { fetchImpl }).fetchPage(3),
      (error: unknown) => error instanceof StatsApiError && error.kind === 'network' && /socket hang up/.test(error.message)
    );
  });
});

describe('NoteApiClient.fetchArticleDetail', () => {
  test('extracts timestamps from the data object', async () => {
    const { fetchImpl, calls } = fakeFetch(() =>
      jsonResponse({
        data: {
          publish_at: '2024-01-01T00:00:00+09:00',
          user: { created_at: '2019-01-01T00:00:00+09:00' },
        },
      })
    );
    const fields = await new NoteApiClient(config, { fetchImpl }).fetchArticleDetail('n1');
    assert.equal(calls[0].url, 'https://stats.example.test/api/v3/notes/n1');
    assert.deepEqual(fields, { publishedAt: '2024-01-01T00:00:00+09:00' });
  });

  test('returns an empty result on HTTP errors', async () => {
    const { fetchImpl } = fakeFetch(() => jsonResponse({}, 404));
    assert.deepEqual(await new NoteApiClient(config, { fetchImpl }).fetchArticleDetail('n1'), {});
  });

  test('returns an empty result on transport errors', async () => {
    const { fetchImpl } = fakeFetch(() => Promise.reject(new Error('timeout')));
    assert.deepEqual(await new NoteApiClient(config, { fetchImpl }).fetchArticleDetail('n1'), {});
  });
});

describe('NoteApiClient.fetchFollowerCount', () => {
  test('reads followerCount for the configured user', async () => {
    const { fetchImpl, calls } = fakeFetch(() => jsonResponse({ data: { followerCount: 120 } }));
    const count = await new NoteApiClient(config, { fetchImpl }).fetchFollowerCount();
    assert.equal(calls[0].url, 'https://stats.example.test/api/v2/creators/writer');
    assert.equal(count, 120);
  });

  test('is unknown without a username and makes no request', async () => {
    const { fetchImpl, calls } = fakeFetch(() => jsonResponse({ data: { followerCount: 120 } }));
    const client = new NoteApiClient({ cookie: config.cookie, baseUrl: config.baseUrl }, { fetchImpl });
    assert.equal(await client.fetchFollowerCount(), undefined);
    assert.equal(calls.length, 0);
  });

  test('is unknown when the lookup fails', async () => {
    const { fetchImpl } = fakeFetch(() => jsonResponse({}, 403));
    assert.equal(await new NoteApiClient(config, { fetchImpl }).fetchFollowerCount(), undefined);
  });
});
