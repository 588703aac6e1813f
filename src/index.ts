import { assertBotConfig, CFG } from './config.js';
import { attachBot, createClient } from './bot.js';
import { createChallengeSystem } from './challenges/index.js';
import { InventoryRewardDispatcher } from './challenges/inventoryRewards.js';
import { DiscordAnnouncer } from './integrations/discordAnnouncer.js';
import { openDatabase } from './persistence/db.js';
import { formatErrorForLogging, setupGlobalErrorHandlers } from './utils/errorhandler.js';
import { logger } from './utils/logger.js';

assertBotConfig();

const db = openDatabase(CFG.dbPath);
const client = createClient();
const system = createChallengeSystem(db, {
  dispatcher: new InventoryRewardDispatcher(db),
  announcer: new DiscordAnnouncer(client),
});
const stopBot = attachBot(client, system);

setupGlobalErrorHandlers(async () => {
  await stopBot();
  db.close();
});

client.login(CFG.token).catch((error) => {
  logger.error('Discord login failed', formatErrorForLogging(error));
  process.exit(1);
});
