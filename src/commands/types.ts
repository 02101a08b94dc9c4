// MARK: - Command Types
// Shared shapes for slash command modules

import type { ChatInputCommandInteraction } from 'discord.js';
import type { TaskManager } from '../services/TaskManager';

export interface CommandContext {
  taskManager: TaskManager;
}

export type CommandHandler = (interaction: ChatInputCommandInteraction) => Promise<void>;
export type CommandExecutor = (interaction: ChatInputCommandInteraction, context: CommandContext) => Promise<void>;
