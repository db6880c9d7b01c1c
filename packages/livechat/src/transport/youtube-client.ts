/**
 * YouTube Data API v3 live chat transport.
 * Read calls work with an API key; sending and identity lookup need an OAuth
 * access token obtained outside Chatcast.
 */

import { DEFAULT_YOUTUBE_BASE_URL, YOUTUBE_MAX_MESSAGE_LENGTH, createLogger } from '@chatcast/core';

import { truncateToLength } from '../humanizer.js';
import {
  asArray,
  asNumber,
  asRecord,
  asString,
  fetchWithRetry,
  joinBaseUrl,
  readJsonObject,
} from '../http.js';
import { extractVideoId } from '../message-parser.js';
import type { IChatOwner, IChatPage, IChatTransport, IRawChatItem } from './types.js';

const log = createLogger('youtube');

export interface IYouTubeClientOptions {
  baseUrl?: string;
  accessToken?: string;
  apiKey?: string;
  /** Retry delays for network errors and 5xx responses */
  retryDelaysMs?: readonly number[];
}

export class YouTubeLiveChatClient implements IChatTransport {
  readonly name = 'youtube';
  readonly maxMessageLength = YOUTUBE_MAX_MESSAGE_LENGTH;

  private readonly baseUrl: string;
  private readonly accessToken: string;
  private readonly apiKey: string;
  private readonly retryDelaysMs: readonly number[] | undefined;

  constructor(options: IYouTubeClientOptions = {}) {
    this.baseUrl = options.baseUrl || DEFAULT_YOUTUBE_BASE_URL;
    this.accessToken = options.accessToken ?? '';
    this.apiKey = options.apiKey ?? '';
    this.retryDelaysMs = options.retryDelaysMs;
  }

  /** Whether messages can be sent (an access token is configured) */
  get canSend(): boolean {
    return this.accessToken.length > 0;
  }

  async resolveActiveChatId(owner: IChatOwner, signal?: AbortSignal): Promise<string | null> {
    let videoId: string | null = null;

    if (owner.videoId) {
      videoId = extractVideoId(owner.videoId);
      if (!videoId) {
        throw new Error(`Not a YouTube video id or URL: ${owner.videoId}`);
      }
    } else if (owner.channelId) {
      videoId = await this.findLiveVideoId(owner.channelId, signal);
    }

    if (!videoId) return null;

    const data = await this.request('GET', '/videos', { part: 'liveStreamingDetails', id: videoId }, signal);
    const first = asRecord(asArray(data.items)[0]);
    const chatId = asString(asRecord(first.liveStreamingDetails).activeLiveChatId);
    return chatId || null;
  }

  async fetchPage(chatId: string, cursor: string | null, signal?: AbortSignal): Promise<IChatPage> {
    const params: Record<string, string> = {
      liveChatId: chatId,
      part: 'snippet,authorDetails',
    };
    if (cursor) params.pageToken = cursor;

    const data = await this.request('GET', '/liveChat/messages', params, signal);

    return {
      items: asArray(data.items)
        .map(toRawChatItem)
        .filter((item): item is IRawChatItem => item !== null),
      nextCursor: asString(data.nextPageToken) ?? null,
      pollingIntervalMs: asNumber(data.pollingIntervalMillis) ?? null,
    };
  }

  async sendMessage(chatId: string, text: string, signal?: AbortSignal): Promise<boolean> {
    const messageText = truncateToLength(text, this.maxMessageLength);
    const response = await fetchWithRetry(
      this.buildUrl('/liveChat/messages', { part: 'snippet' }),
      {
        method: 'POST',
        headers: this.headers(true),
        body: JSON.stringify({
          snippet: {
            liveChatId: chatId,
            type: 'textMessageEvent',
            textMessageDetails: { messageText },
          },
        }),
        signal,
      },
      { delaysMs: this.retryDelaysMs },
    );

    if (response.ok) return true;

    const body = await response.text();
    if (response.status < 500) {
      log.warn('message refused by YouTube', { status: response.status, body: body.slice(0, 200) });
      return false;
    }
    throw new Error(`YouTube API error: ${response.status} ${body}`);
  }

  async resolveSelfIdentity(signal?: AbortSignal): Promise<string | null> {
    if (!this.accessToken) return null;
    const data = await this.request('GET', '/channels', { part: 'id', mine: 'true' }, signal);
    return asString(asRecord(asArray(data.items)[0]).id) ?? null;
  }

  private async findLiveVideoId(channelId: string, signal?: AbortSignal): Promise<string | null> {
    const data = await this.request(
      'GET',
      '/search',
      { part: 'id', channelId, eventType: 'live', type: 'video', maxResults: '1' },
      signal,
    );
    const first = asRecord(asArray(data.items)[0]);
    return asString(asRecord(first.id).videoId) ?? null;
  }

  private buildUrl(route: string, params: Record<string, string>): string {
    const url = new URL(joinBaseUrl(this.baseUrl, route));
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    if (this.apiKey) url.searchParams.set('key', this.apiKey);
    return url.toString();
  }

  private headers(json = false): Record<string, string> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (json) headers['Content-Type'] = 'application/json';
    if (this.accessToken) headers.Authorization = `Bearer ${this.accessToken}`;
    return headers;
  }

  private async request(
    method: 'GET',
    route: string,
    params: Record<string, string>,
    signal?: AbortSignal,
  ): Promise<Record<string, unknown>> {
    const response = await fetchWithRetry(
      this.buildUrl(route, params),
      { method, headers: this.headers(), signal },
      { delaysMs: this.retryDelaysMs },
    );

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`YouTube API error: ${response.status} ${body}`);
    }

    return readJsonObject(response);
  }
}

/** Items without an id cannot be deduplicated and are dropped. */
function toRawChatItem(value: unknown): IRawChatItem | null {
  const item = asRecord(value);
  const id = asString(item.id);
  if (!id) return null;
  const snippet = asRecord(item.snippet);
  const author = asRecord(item.authorDetails);
  const textDetails = asRecord(snippet.textMessageDetails);

  return {
    id,
    authorName: asString(author.displayName) ?? '?',
    authorId: asString(author.channelId) ?? '',
    isOwner: author.isChatOwner === true,
    isModerator: author.isChatModerator === true,
    text: asString(textDetails.messageText) ?? null,
    publishedAt: asString(snippet.publishedAt) ?? '',
  };
}
