import type { CustomContext } from '../telegram/context.js';

export function isOperator(ctx: CustomContext): boolean {
  return ctx.from?.id === ctx.config.adminId;
}

export async function validateOperator(ctx: CustomContext): Promise<boolean> {
  if (isOperator(ctx)) return true;
  await ctx.text('operator.only');
  return false;
}
