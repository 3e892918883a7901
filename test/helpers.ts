import { initLocaleEngine } from '../src/config/locale-engine.js';
import type { Instrument, InstrumentUniverse, OptionType } from '../src/modules/strangle/types.js';
import type { Translate } from '../src/modules/telegram/context.js';

const i18n = initLocaleEngine();

/** Renders through the bot's own English locale file. */
export const i18nT: Translate = (resourceKey, templateData) => i18n.t('en', resourceKey, templateData);

export function option(strike: number, optionType: OptionType, lotSize = 50): Instrument {
  const suffix = optionType === 'CALL' ? 'CE' : 'PE';
  return {
    tradingSymbol: `NIFTY26O22${strike}${suffix}`,
    exchange: 'NFO',
    strike,
    optionType,
    lotSize,
    expiry: '2026-10-22',
  };
}

export function chain(fromStrike: number, toStrike: number, spacing: number): Instrument[] {
  const instruments: Instrument[] = [];
  for (let strike = fromStrike; strike <= toStrike; strike += spacing) {
    instruments.push(option(strike, 'CALL'), option(strike, 'PUT'));
  }
  return instruments;
}

export function universeOf(instruments: Instrument[], strikeSpacing = 50): InstrumentUniverse {
  return { underlying: 'NIFTY', expiry: '2026-10-22', strikeSpacing, instruments };
}
