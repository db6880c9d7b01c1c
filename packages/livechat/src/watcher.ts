/**
 * Live chat watcher.
 * Owns the background poll loop and its lifecycle, and the manual actions the
 * presentation layer triggers while a session runs.
 */

import {
  createLogger,
  extractErrorMessage,
  sleep as defaultSleep,
  withTimeout,
} from '@chatcast/core';
import type { IChatcastConfig, IPersonaSource, IPersonaSelectionResult } from '@chatcast/core';

import type { ITextGenerator } from './ai/client.js';
import type { ChatLog } from './chat-log.js';
import { GreetingStateMachine } from './greeting-state-machine.js';
import { systemRecord } from './message-parser.js';
import { PromptBuilder } from './prompt-builder.js';
import { ReplyGate } from './reply-gate.js';
import type { IChatOwner, IChatTransport } from './transport/types.js';
import type {
  GreetingKind,
  IManualSendResult,
  IWatcherStartOptions,
  IWatcherStartResult,
  IWatcherStatus,
  IWatcherStopResult,
} from './types.js';
import { WatchSession } from './watch-session.js';
import type { IWatchSessionSettings } from './watch-session.js';

const log = createLogger('watcher');

export interface ILiveChatWatcherDeps {
  transport: IChatTransport | null;
  generator: ITextGenerator | null;
  personaSource: IPersonaSource;
  chatLog: ChatLog;
  config: IChatcastConfig;
  now?: () => number;
  /** Abortable sleep; must resolve (not reject) when the signal aborts */
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
}

interface IRunningSession {
  session: WatchSession;
  controller: AbortController;
  loop: Promise<void>;
}

export class LiveChatWatcher {
  private readonly transport: IChatTransport | null;
  private readonly generator: ITextGenerator | null;
  private readonly personaSource: IPersonaSource;
  private readonly chatLog: ChatLog;
  private readonly config: IChatcastConfig;
  private readonly sleep: (ms: number, signal: AbortSignal) => Promise<void>;
  private readonly gate: ReplyGate;
  private readonly greetings = new GreetingStateMachine();
  private readonly promptBuilder: PromptBuilder;

  private running: IRunningSession | null = null;
  private abandonedLoop: Promise<void> | null = null;
  private starting = false;
  private stopping = false;

  constructor(deps: ILiveChatWatcherDeps) {
    this.transport = deps.transport;
    this.generator = deps.generator;
    this.personaSource = deps.personaSource;
    this.chatLog = deps.chatLog;
    this.config = deps.config;
    this.sleep = deps.sleep ?? defaultSleep;
    this.gate = new ReplyGate({
      cooldownMs: deps.config.watcher.replyCooldownMs,
      hasGenerator: deps.generator !== null,
      now: deps.now,
    });
    this.promptBuilder = new PromptBuilder(deps.config.prompt);
  }

  get isRunning(): boolean {
    return this.running !== null;
  }

  /** True while a loop abandoned by stop() has not exited yet */
  get hasAbandonedLoop(): boolean {
    return this.abandonedLoop !== null;
  }

  async start(options: IWatcherStartOptions = {}): Promise<IWatcherStartResult> {
    if (this.running || this.starting) {
      return { started: false, reason: 'already-running', message: 'The watcher is already running' };
    }
    if (this.abandonedLoop || this.stopping) {
      return {
        started: false,
        reason: 'previous-loop-active',
        message: 'The previous watch loop has not exited yet',
      };
    }

    this.starting = true;
    try {
      return await this.startSession(options);
    } finally {
      this.starting = false;
    }
  }

  /**
   * Stop the running session. Waits up to the stop timeout for the loop to
   * exit, then sends the farewell when asked and not already sent.
   */
  async stop(sendFarewell = true): Promise<IWatcherStopResult> {
    const running = this.running;
    if (!running) {
      return { stopped: false, exitedCleanly: true, farewellSent: false };
    }
    this.running = null;
    this.stopping = true;
    try {
      return await this.stopSession(running, sendFarewell);
    } finally {
      this.stopping = false;
    }
  }

  private async stopSession(running: IRunningSession, sendFarewell: boolean): Promise<IWatcherStopResult> {
    running.controller.abort();

    let exitedCleanly = true;
    try {
      await withTimeout(running.loop, this.config.watcher.stopTimeoutMs, 'watch loop shutdown');
    } catch (err) {
      exitedCleanly = false;
      log.warn('watch loop did not exit in time, abandoning it', { error: extractErrorMessage(err) });
      const loop = running.loop;
      this.abandonedLoop = loop;
      void loop.finally(() => {
        if (this.abandonedLoop === loop) {
          this.abandonedLoop = null;
          log.info('abandoned watch loop exited');
        }
      });
    }

    let farewellSent = false;
    const { session } = running;
    const chatId = session.chatId;
    if (sendFarewell && chatId !== null && this.greetings.claimFarewell()) {
      farewellSent = await this.deliverOutsideLoop(session, chatId, session.greetingText('end'));
    }

    log.info('watcher stopped', { exitedCleanly, farewellSent });
    return { stopped: true, exitedCleanly, farewellSent };
  }

  /** Send an operator-typed message through the same delivery path as replies. */
  async sendManual(text: string): Promise<IManualSendResult> {
    const trimmed = text.trim();
    if (!trimmed) {
      return { sent: false, reason: 'empty' };
    }
    return this.sendFromOperator(trimmed);
  }

  /** Send the session character's canned greeting. Leaves the farewell latch untouched. */
  async sendGreeting(kind: GreetingKind): Promise<IManualSendResult> {
    const session = this.running?.session;
    if (!session) {
      return { sent: false, reason: 'not-connected' };
    }
    return this.sendFromOperator(session.greetingText(kind));
  }

  getStatus(): IWatcherStatus {
    const session = this.running?.session ?? null;
    return {
      running: session !== null,
      connected: session?.connected ?? false,
      chatId: session?.chatId ?? null,
      autoReply: session?.settings.autoReply ?? false,
      autoGreet: session?.settings.autoGreet ?? false,
      aiAvailable: this.generator !== null,
      persona: session?.selection.persona.name ?? null,
      character: session?.selection.character.name ?? null,
      transport: this.transport?.name ?? 'none',
      messagesSeen: session?.messagesSeen ?? 0,
    };
  }

  private async startSession(options: IWatcherStartOptions): Promise<IWatcherStartResult> {
    const transport = this.transport;
    if (!transport) {
      return misconfigured('No chat transport is configured');
    }

    const owner = this.resolveOwner(options);
    // Configured targets apply only when the caller names none.
    const explicitTarget = options.owner !== undefined || options.chatId !== undefined;
    const chatId =
      options.chatId?.trim() || (explicitTarget ? null : this.config.youtube.liveChatId || null);
    if (!chatId && !owner.channelId && !owner.videoId) {
      return misconfigured('No chat id, channel id or video id to watch');
    }

    let autoReply = options.autoReply ?? this.config.watcher.autoReply;
    if (autoReply && !this.generator) {
      if (options.autoReply === true) {
        return misconfigured('Automatic replies were requested but no text generator is configured');
      }
      log.warn('no text generator configured, automatic replies disabled for this session');
      autoReply = false;
    }

    let selection: IPersonaSelectionResult | null;
    try {
      const catalog = await this.personaSource.load();
      selection = catalog.select(
        options.personaName ?? this.config.persona.personaName,
        options.characterName ?? this.config.persona.characterName,
      );
    } catch (err) {
      return misconfigured(`Persona catalog failed to load: ${extractErrorMessage(err)}`);
    }
    if (!selection) {
      return misconfigured('The persona catalog has no persona with a character');
    }

    this.gate.reset();
    this.greetings.reset();

    const settings: IWatchSessionSettings = {
      owner,
      chatId,
      autoReply,
      autoGreet: options.autoGreet ?? this.config.watcher.autoGreet,
      greetings: options.greetings ?? {
        start: this.config.persona.startGreeting,
        end: this.config.persona.endGreeting,
      },
    };

    const controller = new AbortController();
    const selfId = await this.resolveSelfId(transport, controller.signal);

    const session = new WatchSession({
      transport,
      generator: this.generator,
      chatLog: this.chatLog,
      gate: this.gate,
      greetings: this.greetings,
      promptBuilder: this.promptBuilder,
      config: this.config.watcher,
      selection,
      settings,
      selfId,
    });

    const loop = this.runLoop(session, controller.signal);
    this.running = { session, controller, loop };

    log.info('watcher started', {
      transport: transport.name,
      chatId: chatId ?? undefined,
      channelId: owner.channelId,
      videoId: owner.videoId,
      persona: selection.persona.name,
      character: selection.character.name,
      autoReply,
      autoGreet: settings.autoGreet,
    });
    return { started: true };
  }

  private resolveOwner(options: IWatcherStartOptions): IChatOwner {
    if (options.owner) {
      return {
        channelId: options.owner.channelId?.trim() || undefined,
        videoId: options.owner.videoId?.trim() || undefined,
      };
    }
    return {
      channelId: this.config.youtube.channelId || undefined,
      videoId: this.config.youtube.videoId || undefined,
    };
  }

  private async resolveSelfId(transport: IChatTransport, signal: AbortSignal): Promise<string | null> {
    if (this.config.youtube.selfChannelId) {
      return this.config.youtube.selfChannelId;
    }
    if (!transport.resolveSelfIdentity) {
      return null;
    }
    try {
      return await withTimeout(
        transport.resolveSelfIdentity(signal),
        this.config.watcher.callTimeoutMs,
        'resolve self identity',
      );
    } catch (err) {
      log.warn('could not resolve the bot identity', { error: extractErrorMessage(err) });
      return null;
    }
  }

  private async runLoop(session: WatchSession, signal: AbortSignal): Promise<void> {
    try {
      while (!signal.aborted) {
        const delay = await session.runCycle(signal);
        if (signal.aborted) break;
        await this.sleep(delay, signal);
      }
    } catch (err) {
      log.error('watch loop crashed', { error: extractErrorMessage(err) });
    }
    log.debug('watch loop exited');
  }

  private async sendFromOperator(text: string): Promise<IManualSendResult> {
    const session = this.running?.session;
    const chatId = session?.chatId ?? null;
    if (!session || !session.connected || chatId === null) {
      return { sent: false, reason: 'not-connected' };
    }
    const sent = await this.deliverOutsideLoop(session, chatId, text);
    return { sent };
  }

  /** Deliver outside the poll loop; a failure becomes a System record. */
  private async deliverOutsideLoop(session: WatchSession, chatId: string, text: string): Promise<boolean> {
    try {
      const record = await session.deliver(chatId, text);
      return record?.delivered === true;
    } catch (err) {
      const message = extractErrorMessage(err);
      log.warn('send failed', { error: message });
      this.chatLog.append(systemRecord(`Send error: ${message}`));
      return false;
    }
  }
}

function misconfigured(message: string): IWatcherStartResult {
  log.warn('watcher not started', { reason: message });
  return { started: false, reason: 'misconfigured', message };
}
