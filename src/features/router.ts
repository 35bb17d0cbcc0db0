import { logger } from '../middleware/logger.js';

/**
 * Command routing — detect which slash command (if any) a message invokes.
 *
 * Accepts `/command args` and `/command@botname args`. A command addressed
 * to a different bot's username is not ours and is treated as no match.
 * Everything that is not a command falls through to the group pipeline.
 */

export type CommandName =
  | 'start'
  | 'help'
  | 'addfaq'
  | 'faqs'
  | 'setreminder'
  | 'reminders'
  | 'cancelreminder';

export interface CommandMatch {
  command: CommandName;
  /** Everything after the command word, trimmed. */
  args: string;
}

const COMMANDS: ReadonlyMap<string, CommandName> = new Map<string, CommandName>([
  ['start', 'start'],
  ['help', 'help'],
  ['addfaq', 'addfaq'],
  ['faqs', 'faqs'],
  ['setreminder', 'setreminder'],
  ['reminders', 'reminders'],
  ['cancelreminder', 'cancelreminder'],
]);

const COMMAND_PATTERN = /^\/([a-z0-9_]+)(?:@([a-z0-9_]+))?(?:\s+([\s\S]*))?$/i;

/** True when the text is shaped like a slash command, known or not. */
export function isCommand(text: string): boolean {
  return COMMAND_PATTERN.test(text.trim());
}

export function matchCommand(text: string, botUsername?: string): CommandMatch | null {
  const match = COMMAND_PATTERN.exec(text.trim());
  if (!match) return null;

  const [, word, target, rest] = match;
  if (target && botUsername && target.toLowerCase() !== botUsername.toLowerCase()) {
    logger.debug({ target, botUsername }, 'Command addressed to another bot');
    return null;
  }

  const command = COMMANDS.get(word.toLowerCase());
  if (!command) return null;

  const args = (rest ?? '').trim();
  logger.debug({ command, args }, 'Command matched');
  return { command, args };
}
