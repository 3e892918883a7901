import { InlineKeyboard } from 'grammy';

export const SNAPSHOT_REFRESH = 'snapshot_refresh';

export function buildSnapshotMarkup(refreshText: string): InlineKeyboard {
  return new InlineKeyboard().text(refreshText, SNAPSHOT_REFRESH);
}
