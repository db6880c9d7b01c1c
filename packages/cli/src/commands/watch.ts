/**
 * Watch command for the Chatcast CLI
 * Runs the live chat watcher in the foreground and prints every chat record
 */

import { Command } from 'commander';

import {
  CONFIG_TOKEN,
  PERSONA_SOURCE_TOKEN,
  container,
  initContainer,
} from '@chatcast/core';
import type { IChatcastConfig, IPersonaSource } from '@chatcast/core';
import { createLiveChatStack, extractVideoId } from '@chatcast/livechat';
import type { IWatcherStartOptions } from '@chatcast/livechat';

import * as ui from '../utils/ui.js';

export interface IWatchOptions {
  video?: string;
  channel?: string;
  chatId?: string;
  persona?: string;
  character?: string;
  /** False with --no-ai */
  ai: boolean;
  /** False with --no-greet */
  greet: boolean;
}

/**
 * Translate command flags into watcher start options. Flags that are not
 * given leave the configured values in place.
 */
export function buildStartOptions(
  options: IWatchOptions,
): { startOptions: IWatcherStartOptions } | { error: string } {
  const startOptions: IWatcherStartOptions = {
    personaName: options.persona,
    characterName: options.character,
  };

  if (options.video !== undefined) {
    const videoId = extractVideoId(options.video);
    if (!videoId) {
      return { error: `Not a YouTube video id or URL: ${options.video}` };
    }
    startOptions.owner = { videoId, channelId: options.channel };
  } else if (options.channel !== undefined) {
    startOptions.owner = { channelId: options.channel };
  }

  if (options.chatId !== undefined) startOptions.chatId = options.chatId;
  if (!options.ai) startOptions.autoReply = false;
  if (!options.greet) startOptions.autoGreet = false;

  return { startOptions };
}

export function watchCommand(program: Command): void {
  program
    .command('watch')
    .description('Watch a live chat in the foreground, replying and greeting as a character')
    .option('--video <urlOrId>', 'Video id or URL of the live stream')
    .option('--channel <id>', 'Channel id whose current live stream is watched')
    .option('--chat-id <id>', 'Live chat id (skips resolution)')
    .option('--persona <name>', 'Persona to use')
    .option('--character <name>', 'Character of the persona to use')
    .option('--no-ai', 'Disable generated replies')
    .option('--no-greet', 'Disable automatic start/end greetings')
    .action(async (options: IWatchOptions) => {
      const built = buildStartOptions(options);
      if ('error' in built) {
        ui.error(built.error);
        process.exit(1);
      }

      const projectDir = process.cwd();
      initContainer(projectDir);
      const baseConfig = container.resolve<IChatcastConfig>(CONFIG_TOKEN);
      const config: IChatcastConfig = {
        ...baseConfig,
        ai: { ...baseConfig.ai, enabled: baseConfig.ai.enabled && options.ai },
      };
      const personaSource = container.resolve<IPersonaSource>(PERSONA_SOURCE_TOKEN);
      const { watcher, chatLog } = createLiveChatStack(config, personaSource);

      chatLog.subscribe((record) => {
        console.log(ui.formatRecord(record));
      });

      const spinner = ui.createSpinner('Starting watcher...').start();
      const result = await watcher.start(built.startOptions);
      if (!result.started) {
        spinner.fail(result.message);
        process.exit(1);
      }

      const status = watcher.getStatus();
      spinner.succeed(`Watching as ${status.persona} / ${status.character}`);
      ui.label('Transport', status.transport);
      ui.label('Replies', status.autoReply ? 'on' : 'off');
      ui.label('Greetings', status.autoGreet ? 'on' : 'off');
      ui.dim('Press Ctrl+C to stop.');

      let stopping = false;
      const shutdown = async (): Promise<void> => {
        if (stopping) {
          process.exit(130);
        }
        stopping = true;
        const stopped = await watcher.stop(true);
        if (stopped.farewellSent) ui.success('Farewell sent');
        if (!stopped.exitedCleanly) ui.warn('Watch loop did not exit in time');
        process.exit(0);
      };
      process.on('SIGINT', () => void shutdown());
      process.on('SIGTERM', () => void shutdown());
    });
}
