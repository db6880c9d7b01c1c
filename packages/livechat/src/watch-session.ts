/**
 * One watcher session: the state owned by the poll loop between a start and
 * the matching stop, and the poll cycle itself.
 */

import {
  createLogger,
  extractErrorMessage,
  linkAbortController,
  withTimeout,
} from '@chatcast/core';
import type { IPersonaSelectionResult, IWatcherConfig } from '@chatcast/core';

import type { ITextGenerator } from './ai/client.js';
import type { ChatLog } from './chat-log.js';
import { greetingText } from './greeting-state-machine.js';
import type { GreetingStateMachine } from './greeting-state-machine.js';
import { cleanGeneratedReply, truncateToLength } from './humanizer.js';
import { botRecord, systemRecord, toChatMessage, viewerRecord } from './message-parser.js';
import type { PromptBuilder } from './prompt-builder.js';
import type { ReplyGate } from './reply-gate.js';
import type { IChatOwner, IChatTransport } from './transport/types.js';
import type { GreetingKind, IChatMessage, IDisplayRecord, IGreetingOverrides } from './types.js';

const log = createLogger('watcher').child('session');

export interface IWatchSessionSettings {
  owner: IChatOwner;
  /** Explicit chat id; when set the owner is never resolved */
  chatId: string | null;
  autoReply: boolean;
  autoGreet: boolean;
  greetings: IGreetingOverrides;
}

export interface IWatchSessionDeps {
  transport: IChatTransport;
  generator: ITextGenerator | null;
  chatLog: ChatLog;
  gate: ReplyGate;
  greetings: GreetingStateMachine;
  promptBuilder: PromptBuilder;
  config: IWatcherConfig;
  selection: IPersonaSelectionResult;
  settings: IWatchSessionSettings;
  /** The bot's own author id, when known */
  selfId: string | null;
}

export class WatchSession {
  readonly selection: IPersonaSelectionResult;
  readonly settings: IWatchSessionSettings;
  readonly selfId: string | null;

  private readonly transport: IChatTransport;
  private readonly generator: ITextGenerator | null;
  private readonly chatLog: ChatLog;
  private readonly gate: ReplyGate;
  private readonly greetings: GreetingStateMachine;
  private readonly promptBuilder: PromptBuilder;
  private readonly config: IWatcherConfig;

  private cursor: string | null = null;
  private pollIntervalMs: number;
  private lastChatId: string | null = null;
  private readonly seenIds = new Set<string>();
  private arrivalOrder = 0;

  constructor(deps: IWatchSessionDeps) {
    this.transport = deps.transport;
    this.generator = deps.generator;
    this.chatLog = deps.chatLog;
    this.gate = deps.gate;
    this.greetings = deps.greetings;
    this.promptBuilder = deps.promptBuilder;
    this.config = deps.config;
    this.selection = deps.selection;
    this.settings = deps.settings;
    this.selfId = deps.selfId;
    this.pollIntervalMs = deps.config.defaultPollIntervalMs;
  }

  /** Chat id of the current (or, once lost, the last) connected stretch */
  get chatId(): string | null {
    return this.lastChatId;
  }

  get connected(): boolean {
    return this.greetings.connected && this.lastChatId !== null;
  }

  get messagesSeen(): number {
    return this.arrivalOrder;
  }

  get currentCursor(): string | null {
    return this.cursor;
  }

  get currentPollIntervalMs(): number {
    return this.pollIntervalMs;
  }

  /**
   * Run one poll cycle and return how long to sleep before the next one.
   * Never throws: failures become System records and a backoff delay.
   */
  async runCycle(signal: AbortSignal): Promise<number> {
    if (signal.aborted) return 0;

    let chatId: string | null;
    try {
      chatId = await this.resolveChatId(signal);
    } catch (err) {
      if (signal.aborted) return 0;
      const message = extractErrorMessage(err);
      log.warn('chat id resolution failed', { error: message });
      this.chatLog.append(systemRecord(`Chat resolution error: ${message}`));
      return this.config.resolveBackoffMs;
    }
    if (signal.aborted) return 0;

    if (chatId !== null && this.lastChatId !== null && chatId !== this.lastChatId) {
      log.info('active chat changed, starting from a fresh cursor', { from: this.lastChatId, to: chatId });
      this.cursor = null;
      this.seenIds.clear();
    }

    try {
      const edge = this.greetings.observe(chatId !== null);
      const greetingTarget = edge === 'start' ? chatId : this.lastChatId;
      if (chatId !== null) {
        this.lastChatId = chatId;
      }
      if (edge && this.settings.autoGreet && greetingTarget) {
        await this.deliver(greetingTarget, this.greetingText(edge), signal);
      }

      if (chatId === null) {
        return this.config.resolveBackoffMs;
      }

      return await this.pollOnce(chatId, signal);
    } catch (err) {
      if (signal.aborted) return 0;
      const message = extractErrorMessage(err);
      log.warn('poll cycle failed', { error: message });
      this.chatLog.append(systemRecord(`Watcher error: ${message}`));
      return this.config.errorBackoffMs;
    }
  }

  /**
   * Send `text` to `chatId` and append the matching bot record.
   * Without a signal the send is bounded only by the call timeout.
   */
  async deliver(chatId: string, text: string, signal?: AbortSignal): Promise<IDisplayRecord | null> {
    const outgoing = truncateToLength(text, this.transport.maxMessageLength);
    const delivered = await this.call('send message', signal, (s) =>
      this.transport.sendMessage(chatId, outgoing, s),
    );
    if (signal?.aborted) return null;
    if (!delivered) {
      log.warn('message not delivered', { chatId });
    }
    return this.chatLog.append(botRecord(outgoing, delivered));
  }

  greetingText(kind: GreetingKind): string {
    return greetingText(kind, this.selection.character, this.settings.greetings);
  }

  private async resolveChatId(signal: AbortSignal): Promise<string | null> {
    if (this.settings.chatId) return this.settings.chatId;
    return this.call('resolve chat id', signal, (s) =>
      this.transport.resolveActiveChatId(this.settings.owner, s),
    );
  }

  private async pollOnce(chatId: string, signal: AbortSignal): Promise<number> {
    const page = await this.call('fetch messages', signal, (s) =>
      this.transport.fetchPage(chatId, this.cursor, s),
    );
    if (signal.aborted) return 0;

    this.cursor = page.nextCursor;
    this.pollIntervalMs = Math.max(
      this.config.minPollIntervalMs,
      page.pollingIntervalMs ?? this.config.defaultPollIntervalMs,
    );

    let sendFailed = false;
    for (const item of page.items) {
      if (signal.aborted) return 0;
      if (this.seenIds.has(item.id)) continue;

      const message = toChatMessage(item, this.arrivalOrder + 1);
      if (!message) continue;

      this.seenIds.add(item.id);
      this.arrivalOrder = message.arrivalOrder;
      this.chatLog.append(viewerRecord(message));

      const isSelf = this.selfId !== null && message.authorId === this.selfId;
      if (!this.gate.shouldReply(message.authorId, this.settings.autoReply, isSelf)) continue;

      const reply = await this.generateReply(message, signal);
      if (signal.aborted) return 0;
      if (!reply) continue;

      // The cursor has already moved past this page, so the rest of it must still be recorded.
      try {
        await this.deliver(chatId, reply, signal);
      } catch (err) {
        if (signal.aborted) return 0;
        const errorMessage = extractErrorMessage(err);
        log.warn('reply send failed', { error: errorMessage });
        this.chatLog.append(systemRecord(`Watcher error: ${errorMessage}`));
        sendFailed = true;
      }
    }

    return sendFailed ? this.config.errorBackoffMs : this.pollIntervalMs;
  }

  /** Empty string when generation fails; the reply is then skipped. */
  private async generateReply(message: IChatMessage, signal: AbortSignal): Promise<string> {
    if (!this.generator) return '';
    const generator = this.generator;
    const { persona, character } = this.selection;
    const prompt = this.promptBuilder.build(persona, character, message.text);
    const maxChars = Math.min(this.promptBuilder.maxReplyChars, this.transport.maxMessageLength);

    const { controller, dispose } = linkAbortController(signal);
    try {
      const raw = await withTimeout(
        generator.generate(prompt, controller.signal),
        this.config.generationTimeoutMs,
        'reply generation',
      );
      const reply = cleanGeneratedReply(raw, maxChars);
      if (!reply) {
        log.warn('generator returned an empty reply', { author: message.authorName });
      }
      return reply;
    } catch (err) {
      if (!signal.aborted) {
        log.warn('reply generation failed', { author: message.authorName, error: extractErrorMessage(err) });
      }
      return '';
    } finally {
      controller.abort();
      dispose();
    }
  }

  /** Run a transport call bounded by the call timeout and the session signal. */
  private async call<T>(
    label: string,
    signal: AbortSignal | undefined,
    fn: (signal: AbortSignal) => Promise<T>,
  ): Promise<T> {
    const { controller, dispose } = linkAbortController(signal);
    try {
      return await withTimeout(fn(controller.signal), this.config.callTimeoutMs, label);
    } finally {
      controller.abort();
      dispose();
    }
  }
}
