import { startBot } from './config/bot.js';
import { connectToDb } from './config/database.js';
import { readConfig } from './config/env.js';

const config = readConfig();
const database = await connectToDb(config.dbConnectionString);
await startBot(database, config);
console.log(`[BOT] Started, operator ${config.adminId}, underlying ${config.underlying}`);
