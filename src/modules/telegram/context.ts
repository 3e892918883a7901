import type { I18nContextFlavor, TemplateData } from '@grammyjs/i18n';
import type { Context, SessionFlavor } from 'grammy';

import type { AppConfig } from '../../config/env.js';
import type { Database } from '../database/types.js';
import type { StrangleDesk } from '../strangle/desk.js';
import type { Extra } from './bot.js';

export type Translate = (resourceKey: string, templateData?: TemplateData) => string;

export type SessionData = {
  __language_code?: string;
};

export interface Custom<C extends Context> {
  text: (resourceKey: string, templateData?: TemplateData, extra?: Extra) => ReturnType<C['reply']>;
  db: Database;
  config: AppConfig;
  desk: StrangleDesk;
}

export type CustomContextMethods = Custom<Context>;

export type CustomContext = Context & Custom<Context> & I18nContextFlavor & SessionFlavor<SessionData>;

export function createReplyWithTextFunc(ctx: CustomContext): CustomContextMethods['text'] {
  return (resourceKey, templateData, extra = {}) => {
    extra.parse_mode = 'HTML';
    extra.link_preview_options = {
      is_disabled: true,
    };
    const text = ctx.i18n.t(resourceKey, templateData);
    return ctx.reply(text, extra);
  };
}
