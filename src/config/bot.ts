import type { I18n } from '@grammyjs/i18n';
import { Bot as TelegramBot, session } from 'grammy';

import type { Database } from '../modules/database/types.js';
import { createKiteClient } from '../modules/kite/client.js';
import { startController } from '../modules/start/controller.js';
import { strangleCallbacks, strangleController } from '../modules/strangle/controller.js';
import { StrangleDesk } from '../modules/strangle/desk.js';
import type { Bot } from '../modules/telegram/bot.js';
import { createReplyWithTextFunc } from '../modules/telegram/context.js';
import { findUserById } from '../modules/user/data.js';
import type { AppConfig } from './env.js';
import { initLocaleEngine } from './locale-engine.js';

function extendContext(bot: Bot, database: Database, config: AppConfig, desk: StrangleDesk) {
  bot.use(async (ctx, next) => {
    if (!ctx.chat || !ctx.from) {
      return;
    }

    ctx.text = createReplyWithTextFunc(ctx);
    ctx.db = database;
    ctx.config = config;
    ctx.desk = desk;

    await next();
  });
}

function setupMiddlewares(bot: Bot, localeEngine: I18n) {
  bot.use(
    session({
      initial: () => ({}),
    }),
  );
  bot.use(localeEngine);
  bot.catch(error => {
    console.error('[BOT] Unhandled update error:', error.error);
  });
}

function setupControllers(bot: Bot) {
  bot.use(startController);
  bot.use(strangleController);
  bot.use(strangleCallbacks);
}

async function restoreSession(database: Database, config: AppConfig, desk: StrangleDesk) {
  const operator = await findUserById(database, config.adminId);
  if (!operator?.accessToken) {
    console.log('[BOT] No stored broker session, waiting for /login');
    return;
  }
  try {
    await desk.connect(operator.accessToken);
  } catch (error) {
    console.error('[BOT] Stored broker session could not be restored:', error);
  }
}

export async function startBot(database: Database, config: AppConfig): Promise<Bot> {
  const bot: Bot = new TelegramBot(config.token);
  const desk = new StrangleDesk(config, createKiteClient(config.kiteApiKey));

  await restoreSession(database, config, desk);

  const i18n = initLocaleEngine();

  extendContext(bot, database, config, desk);
  setupMiddlewares(bot, i18n);
  setupControllers(bot);

  await strangleController.setCommands(bot);

  return new Promise((resolve, reject) => {
    bot
      .start({
        onStart: () => resolve(bot),
      })
      .catch(reject);
  });
}
