// MARK: - Commands Index
// Export command builders and handlers

import type { RESTPostAPIChatInputApplicationCommandsJSONBody } from 'discord.js';
import * as task from './task';
import * as reminders from './reminders';
import type { CommandContext, CommandExecutor, CommandHandler } from './types';

export type { CommandContext, CommandHandler } from './types';

const modules: Array<{ data: { name: string; toJSON(): RESTPostAPIChatInputApplicationCommandsJSONBody }; execute: CommandExecutor }> = [
  task,
  reminders,
];

// Export commands array for deployment
export const commands: RESTPostAPIChatInputApplicationCommandsJSONBody[] = modules.map(command => command.data.toJSON());

/**
 * Binds every command executor to the running services.
 */
export function buildCommandHandlers(context: CommandContext): Map<string, CommandHandler> {
  return new Map<string, CommandHandler>(
    modules.map((command): [string, CommandHandler] => [
      command.data.name,
      interaction => command.execute(interaction, context),
    ]),
  );
}

export function getCommandNames(): string[] {
  return modules.map(command => command.data.name);
}
