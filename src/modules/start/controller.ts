import { Composer } from 'grammy';

import { describeError } from '../strangle/errors.js';
import type { CustomContext } from '../telegram/context.js';
import { saveAccessToken } from '../user/data.js';
import { validateOperator } from '../user/utils.js';
import { escapeHtml } from '../utils/formatting.js';

export const startController = new Composer<CustomContext>();

startController.command('start', async ctx => {
  if (!(await validateOperator(ctx))) return;
  const universe = ctx.desk.getEngine()?.getUniverse();
  const status = universe
    ? ctx.i18n.t('start.session_active', { underlying: universe.underlying, expiry: universe.expiry })
    : ctx.i18n.t('start.session_missing');
  await ctx.text('start.help', { status });
});

startController.command('login', async ctx => {
  if (!ctx.from || !(await validateOperator(ctx))) return;

  const requestToken = (ctx.match || '').trim();
  if (!requestToken) {
    await ctx.text('login.link', { url: escapeHtml(ctx.desk.loginUrl()) });
    return;
  }

  try {
    const { accessToken, universe } = await ctx.desk.login(requestToken);
    await saveAccessToken(ctx.db, ctx.from.id, accessToken);
    await ctx.text('login.success', {
      underlying: universe.underlying,
      expiry: universe.expiry,
      count: universe.instruments.length,
      step: universe.strikeSpacing,
    });
  } catch (error) {
    console.error('[BOT] Login failed:', error);
    await ctx.text('login.error', { error: escapeHtml(describeError(error)) });
  }
});
