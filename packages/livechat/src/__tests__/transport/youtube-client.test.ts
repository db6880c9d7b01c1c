/**
 * Tests for YouTubeLiveChatClient against a stubbed fetch.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { YouTubeLiveChatClient } from '../../transport/youtube-client.js';

vi.mock('@chatcast/core', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@chatcast/core')>();
  const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
  return { ...actual, createLogger: () => ({ ...logger, child: () => logger }) };
});

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function requestedUrl(call: unknown[]): URL {
  return new URL(String(call[0]));
}

describe('YouTubeLiveChatClient', () => {
  let fetchMock: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  function buildClient(): YouTubeLiveChatClient {
    return new YouTubeLiveChatClient({
      baseUrl: 'https://yt.test/youtube/v3/',
      accessToken: 'test-token',
      apiKey: 'test-key',
      retryDelaysMs: [0, 0, 0],
    });
  }

  describe('resolveActiveChatId', () => {
    it('resolves the chat id of a video URL', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({ items: [{ liveStreamingDetails: { activeLiveChatId: 'chat-xyz' } }] }),
      );

      const chatId = await buildClient().resolveActiveChatId({
        videoId: 'https://youtu.be/abcdefghijk',
      });

      expect(chatId).toBe('chat-xyz');
      const url = requestedUrl(fetchMock.mock.calls[0]);
      expect(url.pathname).toBe('/youtube/v3/videos');
      expect(url.searchParams.get('id')).toBe('abcdefghijk');
      expect(url.searchParams.get('part')).toBe('liveStreamingDetails');
      expect(url.searchParams.get('key')).toBe('test-key');
    });

    it('searches the live video of a channel first', async () => {
      fetchMock
        .mockResolvedValueOnce(jsonResponse({ items: [{ id: { videoId: 'live0000001' } }] }))
        .mockResolvedValueOnce(
          jsonResponse({ items: [{ liveStreamingDetails: { activeLiveChatId: 'chat-live' } }] }),
        );

      const chatId = await buildClient().resolveActiveChatId({ channelId: 'UC-test' });

      expect(chatId).toBe('chat-live');
      const search = requestedUrl(fetchMock.mock.calls[0]);
      expect(search.pathname).toBe('/youtube/v3/search');
      expect(search.searchParams.get('channelId')).toBe('UC-test');
      expect(search.searchParams.get('eventType')).toBe('live');
      expect(requestedUrl(fetchMock.mock.calls[1]).searchParams.get('id')).toBe('live0000001');
    });

    it('returns null when the channel is not live', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ items: [] }));

      expect(await buildClient().resolveActiveChatId({ channelId: 'UC-test' })).toBeNull();
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('returns null when the video has no active chat', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ items: [{ liveStreamingDetails: {} }] }));

      expect(await buildClient().resolveActiveChatId({ videoId: 'abcdefghijk' })).toBeNull();
    });

    it('throws on an unusable video reference', async () => {
      await expect(buildClient().resolveActiveChatId({ videoId: 'not a video' })).rejects.toThrow(
        'Not a YouTube video id or URL: not a video',
      );
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('throws on an API error', async () => {
      fetchMock.mockResolvedValueOnce(new Response('forbidden', { status: 403 }));

      await expect(buildClient().resolveActiveChatId({ videoId: 'abcdefghijk' })).rejects.toThrow(
        'YouTube API error: 403 forbidden',
      );
    });
  });

  describe('fetchPage', () => {
    it('maps items, cursor and polling interval', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({
          nextPageToken: 'cursor-2',
          pollingIntervalMillis: 4500,
          items: [
            {
              id: 'msg-1',
              snippet: {
                publishedAt: '2026-01-01T10:00:00Z',
                textMessageDetails: { messageText: 'hello!' },
              },
              authorDetails: {
                displayName: 'Viewer One',
                channelId: 'UC-viewer',
                isChatOwner: false,
                isChatModerator: true,
              },
            },
            {
              id: 'msg-2',
              snippet: { publishedAt: '2026-01-01T10:00:01Z', type: 'newSponsorEvent' },
              authorDetails: { displayName: 'Member', channelId: 'UC-member' },
            },
          ],
        }),
      );

      const page = await buildClient().fetchPage('chat-1', 'cursor-1');

      expect(page.nextCursor).toBe('cursor-2');
      expect(page.pollingIntervalMs).toBe(4500);
      expect(page.items).toEqual([
        {
          id: 'msg-1',
          authorName: 'Viewer One',
          authorId: 'UC-viewer',
          isOwner: false,
          isModerator: true,
          text: 'hello!',
          publishedAt: '2026-01-01T10:00:00Z',
        },
        {
          id: 'msg-2',
          authorName: 'Member',
          authorId: 'UC-member',
          isOwner: false,
          isModerator: false,
          text: null,
          publishedAt: '2026-01-01T10:00:01Z',
        },
      ]);
      const url = requestedUrl(fetchMock.mock.calls[0]);
      expect(url.pathname).toBe('/youtube/v3/liveChat/messages');
      expect(url.searchParams.get('liveChatId')).toBe('chat-1');
      expect(url.searchParams.get('pageToken')).toBe('cursor-1');
      expect(url.searchParams.get('part')).toBe('snippet,authorDetails');
    });

    it('omits the page token on the first fetch and defaults missing fields', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({}));

      const page = await buildClient().fetchPage('chat-1', null);

      expect(page).toEqual({ items: [], nextCursor: null, pollingIntervalMs: null });
      expect(requestedUrl(fetchMock.mock.calls[0]).searchParams.has('pageToken')).toBe(false);
    });

    it('drops items that carry no id', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({
          items: [
            { snippet: { textMessageDetails: { messageText: 'no id' } } },
            { id: '', snippet: { textMessageDetails: { messageText: 'blank id' } } },
            { id: 'msg-1', snippet: { textMessageDetails: { messageText: 'kept' } } },
          ],
        }),
      );

      const page = await buildClient().fetchPage('chat-1', null);

      expect(page.items.map((item) => [item.id, item.text])).toEqual([['msg-1', 'kept']]);
    });

    it('retries 5xx responses before giving up', async () => {
      fetchMock.mockImplementation(async () => new Response('unavailable', { status: 503 }));

      await expect(buildClient().fetchPage('chat-1', null)).rejects.toThrow(
        'YouTube API error: 503 unavailable',
      );
      expect(fetchMock).toHaveBeenCalledTimes(4);
    });

    it('retries network errors and succeeds', async () => {
      fetchMock
        .mockRejectedValueOnce(new TypeError('fetch failed'))
        .mockResolvedValueOnce(jsonResponse({ items: [] }));

      const page = await buildClient().fetchPage('chat-1', null);

      expect(page.items).toEqual([]);
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });
  });

  describe('sendMessage', () => {
    it('posts a text message event with the bearer token', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ id: 'sent-1' }));

      const ok = await buildClient().sendMessage('chat-1', 'Thanks for watching!');

      expect(ok).toBe(true);
      const [url, init] = fetchMock.mock.calls[0];
      expect(new URL(String(url)).searchParams.get('part')).toBe('snippet');
      const request = new Request(String(url), init);
      expect(request.method).toBe('POST');
      expect(request.headers.get('authorization')).toBe('Bearer test-token');
      expect(await request.json()).toEqual({
        snippet: {
          liveChatId: 'chat-1',
          type: 'textMessageEvent',
          textMessageDetails: { messageText: 'Thanks for watching!' },
        },
      });
    });

    it('truncates text to 200 characters', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({}));

      await buildClient().sendMessage('chat-1', 'a'.repeat(250));

      const [url, init] = fetchMock.mock.calls[0];
      const body: unknown = await new Request(String(url), init).json();
      expect(body).toMatchObject({ snippet: { textMessageDetails: { messageText: 'a'.repeat(200) } } });
    });

    it('returns false when the API refuses the message', async () => {
      fetchMock.mockResolvedValueOnce(new Response('rate limited', { status: 403 }));

      expect(await buildClient().sendMessage('chat-1', 'hi')).toBe(false);
    });

    it('throws after retries on server errors', async () => {
      fetchMock.mockImplementation(async () => new Response('oops', { status: 500 }));

      await expect(buildClient().sendMessage('chat-1', 'hi')).rejects.toThrow('YouTube API error: 500 oops');
    });
  });

  describe('resolveSelfIdentity', () => {
    it('reads the id of the authenticated channel', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ items: [{ id: 'UC-bot' }] }));

      expect(await buildClient().resolveSelfIdentity()).toBe('UC-bot');
      expect(requestedUrl(fetchMock.mock.calls[0]).searchParams.get('mine')).toBe('true');
    });

    it('returns null without an access token', async () => {
      const client = new YouTubeLiveChatClient({ apiKey: 'test-key' });

      expect(await client.resolveSelfIdentity()).toBeNull();
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });
});
