// MARK: - Main Bot Entry Point
// Discord bot initialization, reminder scheduler startup, and graceful shutdown

import 'dotenv/config';
import { Client, Events, GatewayIntentBits, REST, Routes } from 'discord.js';
import mongoose from 'mongoose';
import { BotConfig, loadBotConfig, loadReminderConfig, ReminderConfig } from './config';
import { buildCommandHandlers, commands } from './commands';
import { MongoTaskStore } from './services/TaskStore';
import { TaskManager } from './services/TaskManager';
import { DiscordNotifier } from './services/DiscordNotifier';
import { ReminderScheduler } from './services/ReminderScheduler';
import { createApiRouter } from './api';
import { initializeHealthServer, mountRouter, startHealthServer, stopHealthServer } from './health';
import { errorMessage } from './utils/errors';
import { replyEphemeral } from './utils/interactionCleanup';
import { logger } from './utils/logger';

// MARK: - Configuration
function loadConfiguration(): { botConfig: BotConfig; reminderConfig: ReminderConfig } {
  try {
    return {
      botConfig: loadBotConfig(),
      reminderConfig: loadReminderConfig(),
    };
  } catch (error) {
    logger.error('Invalid configuration', { error: errorMessage(error) });
    return process.exit(1);
  }
}

const { botConfig, reminderConfig } = loadConfiguration();

// MARK: - Services
const client = new Client({
  intents: [GatewayIntentBits.Guilds],
});

const taskStore = new MongoTaskStore();
const taskManager = new TaskManager(taskStore, reminderConfig.defaultOffsets);
const scheduler = new ReminderScheduler({
  store: taskStore,
  notifier: new DiscordNotifier(client),
  pollIntervalMinutes: reminderConfig.pollIntervalMinutes,
  shutdownTimeoutMs: reminderConfig.shutdownTimeoutMs,
});
const handlers = buildCommandHandlers({ taskManager });

// MARK: - MongoDB Connection
async function connectMongoDB(): Promise<void> {
  const maxRetries = 5;
  let retries = 0;

  while (retries < maxRetries) {
    try {
      await mongoose.connect(botConfig.mongoUri, {
        maxPoolSize: 10,
        minPoolSize: 2,
        serverSelectionTimeoutMS: 5000,
      });
      logger.info('MongoDB connected successfully');
      return;
    } catch (error) {
      retries++;
      logger.error(`MongoDB connection attempt ${retries} failed`, {
        error: errorMessage(error),
        retries,
        maxRetries,
      });

      if (retries >= maxRetries) {
        throw new Error('Failed to connect to MongoDB after maximum retries');
      }

      const delay = Math.min(1000 * Math.pow(2, retries), 10000);
      logger.info(`Retrying MongoDB connection in ${delay}ms...`);
      await new Promise(resolve => setTimeout(resolve, delay));
    }
  }
}

mongoose.connection.on('error', (error: Error) => {
  logger.error('Mongoose connection error', { error: error.message });
});

mongoose.connection.on('disconnected', () => {
  logger.warn('Mongoose disconnected from MongoDB');
});

// MARK: - Event: Client Ready
client.once(Events.ClientReady, async readyClient => {
  logger.info(`Bot logged in as: ${readyClient.user.tag}`, {
    guilds: readyClient.guilds.cache.size,
    commands: commands.length,
  });

  try {
    const rest = new REST({ version: '10' }).setToken(botConfig.token);
    await rest.put(
      Routes.applicationGuildCommands(botConfig.clientId, botConfig.guildId),
      { body: commands },
    );
    logger.info(`✓ Registered ${commands.length} slash commands`);

    scheduler.start();
    logger.info('✓ Reminder scheduler started');

    initializeHealthServer({ client, scheduler });
    mountRouter('/api', createApiRouter({ taskManager }));
    await startHealthServer(botConfig.port, !botConfig.portExplicit);
    logger.info('✓ Health server started');
  } catch (error) {
    logger.error('Failed to initialize bot services', {
      error: errorMessage(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    process.exit(1);
  }
});

// MARK: - Event: Interaction Create
client.on(Events.InteractionCreate, async interaction => {
  if (!interaction.isChatInputCommand()) {
    return;
  }

  const handler = handlers.get(interaction.commandName);
  if (!handler) {
    logger.warn('Unknown command', { commandName: interaction.commandName });
    await replyEphemeral(interaction, '❌ Unknown command.');
    return;
  }

  try {
    logger.info('Command executed', {
      commandName: interaction.commandName,
      userId: interaction.user.id,
      guildId: interaction.guildId,
    });
    await handler(interaction);
  } catch (error) {
    logger.error('Command execution failed', {
      commandName: interaction.commandName,
      userId: interaction.user.id,
      error: errorMessage(error),
    });

    try {
      await replyEphemeral(interaction, '❌ An error occurred while executing this command.');
    } catch (replyError) {
      logger.warn('Failed to report command failure', { error: errorMessage(replyError) });
    }
  }
});

// MARK: - Graceful Shutdown
let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  logger.info(`Received ${signal}, shutting down gracefully...`);

  try {
    await scheduler.shutdown();
    logger.info('✓ Reminder scheduler stopped');

    await client.destroy();
    logger.info('✓ Discord client destroyed');

    await mongoose.connection.close();
    logger.info('✓ MongoDB connection closed');

    await stopHealthServer();
    logger.info('Shutdown complete');
    process.exit(0);
  } catch (error) {
    logger.error('Error during shutdown', { error: errorMessage(error) });
    process.exit(1);
  }
}

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});
process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

process.on('uncaughtException', error => {
  logger.error('Uncaught exception', { error: error.message, stack: error.stack });
  process.exit(1);
});

process.on('unhandledRejection', reason => {
  logger.error('Unhandled promise rejection', {
    reason: errorMessage(reason),
    stack: reason instanceof Error ? reason.stack : undefined,
  });
  process.exit(1);
});

// MARK: - Start Bot
async function start(): Promise<void> {
  logger.info('Starting task reminder bot...', {
    pollIntervalMinutes: reminderConfig.pollIntervalMinutes,
    defaultReminderOffsets: reminderConfig.defaultOffsets,
  });

  await connectMongoDB();
  await client.login(botConfig.token);
}

start().catch(error => {
  logger.error('Failed to start bot', {
    error: errorMessage(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
