/**
 * Live chat composition root.
 * Wires YouTubeLiveChatClient + AiTextGenerator + ChatLog -> LiveChatWatcher
 * from a single config object.
 */

import type { IChatcastConfig, IPersonaSource } from '@chatcast/core';

import { createTextGenerator } from './ai/client.js';
import type { AiTextGenerator } from './ai/client.js';
import { ChatLog } from './chat-log.js';
import { YouTubeLiveChatClient } from './transport/youtube-client.js';
import { LiveChatWatcher } from './watcher.js';

export interface ILiveChatStack {
  transport: YouTubeLiveChatClient;
  generator: AiTextGenerator | null;
  chatLog: ChatLog;
  watcher: LiveChatWatcher;
}

/**
 * Build a fully-wired live chat stack from config.
 * The returned `watcher` is ready to `.start()`.
 */
export function createLiveChatStack(config: IChatcastConfig, personaSource: IPersonaSource): ILiveChatStack {
  const transport = new YouTubeLiveChatClient({
    baseUrl: config.youtube.baseUrl,
    accessToken: config.youtube.accessToken,
    apiKey: config.youtube.apiKey,
  });
  const generator = createTextGenerator(config.ai);
  const chatLog = new ChatLog({ limit: config.watcher.chatLogLimit });
  const watcher = new LiveChatWatcher({ transport, generator, personaSource, chatLog, config });
  return { transport, generator, chatLog, watcher };
}
