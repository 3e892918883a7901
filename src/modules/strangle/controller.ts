import { CommandGroup } from '@grammyjs/commands';
import { Composer } from 'grammy';

import { findRecentLegs, recordLegAttempt } from '../journal/data.js';
import type { CustomContext } from '../telegram/context.js';
import { SNAPSHOT_REFRESH, buildSnapshotMarkup } from '../telegram/markup.js';
import { validateOperator } from '../user/utils.js';
import { escapeHtml, formatPrice } from '../utils/formatting.js';
import { createChatSink } from './delivery.js';
import type { StrangleEngine } from './engine.js';
import { StrangleError, describeError } from './errors.js';
import { formatJobs, formatSnapshot } from './formatting.js';
import { parseFireTime, parseScheduleInput } from './time.js';

export const strangleController = new CommandGroup<CustomContext>();
export const strangleCallbacks = new Composer<CustomContext>();

async function requireEngine(ctx: CustomContext): Promise<StrangleEngine | null> {
  if (!(await validateOperator(ctx))) return null;
  const engine = ctx.desk.getEngine();
  if (!engine) {
    await ctx.text('operator.no_session');
    return null;
  }
  return engine;
}

async function handleSchedule(ctx: CustomContext) {
  const engine = await requireEngine(ctx);
  if (!engine || !ctx.chat) return;

  const raw = typeof ctx.match === 'string' ? ctx.match : '';
  const request = parseScheduleInput(raw);
  if (!request) {
    await ctx.text('schedule.usage');
    return;
  }

  const chatId = ctx.chat.id;
  const database = ctx.db;
  const api = ctx.api;
  const i18nT = ctx.i18n.t.bind(ctx.i18n);
  try {
    const fireAt = parseFireTime(request.time);
    engine.requestSchedule(
      request.targetPrice,
      fireAt,
      createChatSink({
        send: text => api.sendMessage(chatId, text, { parse_mode: 'HTML' }),
        record: entry => recordLegAttempt(database, entry),
        i18nT,
      }),
    );
  } catch (error) {
    if (error instanceof StrangleError) {
      await ctx.text('schedule.error', { error: escapeHtml(error.message) });
      return;
    }
    throw error;
  }
}

async function sendSnapshot(ctx: CustomContext, engine: StrangleEngine) {
  try {
    const snapshot = await engine.refreshSnapshot();
    const text = formatSnapshot(snapshot, engine.getUniverse().strikeSpacing, ctx.i18n.t.bind(ctx.i18n));
    await ctx.reply(text, {
      parse_mode: 'HTML',
      link_preview_options: { is_disabled: true },
      reply_markup: buildSnapshotMarkup(ctx.i18n.t('snapshot.refresh')),
    });
  } catch (error) {
    console.error('[BOT] Snapshot refresh failed:', error);
    await ctx.text('snapshot.error', { error: escapeHtml(describeError(error)) });
  }
}

strangleController.command('schedule', 'Sell a strangle near a price at a time', handleSchedule);

strangleController.command('sell', 'Same as /schedule', handleSchedule);

strangleController.command('jobs', 'Armed jobs', async ctx => {
  const engine = await requireEngine(ctx);
  if (!engine) return;
  await ctx.reply(formatJobs(engine.pendingJobs(), ctx.i18n.t.bind(ctx.i18n)), {
    parse_mode: 'HTML',
    link_preview_options: { is_disabled: true },
  });
});

strangleController.command('snapshot', 'ATM and candidate strikes', async ctx => {
  const engine = await requireEngine(ctx);
  if (!engine) return;
  await sendSnapshot(ctx, engine);
});

strangleController.command('orders', 'Recent order legs', async ctx => {
  if (!(await validateOperator(ctx))) return;
  const legs = await findRecentLegs(ctx.db, 10);
  if (legs.length === 0) {
    await ctx.text('orders.empty');
    return;
  }
  const lines = legs.map(entry => {
    const templateData = {
      job: entry.jobId,
      leg: entry.leg,
      symbol: escapeHtml(entry.symbol),
      quantity: entry.quantity,
      stopLoss: formatPrice(entry.stopLoss),
    };
    return entry.orderId
      ? ctx.i18n.t('orders.placed', { ...templateData, orderId: escapeHtml(entry.orderId) })
      : ctx.i18n.t('orders.rejected', { ...templateData, reason: escapeHtml(entry.reason ?? '') });
  });
  await ctx.reply(lines.join('\n'), {
    parse_mode: 'HTML',
    link_preview_options: { is_disabled: true },
  });
});

strangleCallbacks.callbackQuery(SNAPSHOT_REFRESH, async ctx => {
  await ctx.answerCallbackQuery();
  const engine = await requireEngine(ctx);
  if (!engine) return;
  await sendSnapshot(ctx, engine);
});
