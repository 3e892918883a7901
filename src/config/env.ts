import type { QuoteKey } from '../modules/strangle/types.js';

export type AppConfig = {
  token: string;
  dbConnectionString: string;
  adminId: number;
  kiteApiKey: string;
  kiteApiSecret: string;
  underlying: string;
  reference: QuoteKey;
};

const REQUIRED = ['TOKEN', 'DB_CONNECTION_STRING', 'ADMIN_ID', 'KITE_API_KEY', 'KITE_API_SECRET'] as const;

export function readConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const missing = REQUIRED.filter(name => !env[name]?.trim());
  if (missing.length > 0) {
    throw new Error(`Missing environment variables: ${missing.join(', ')}`);
  }

  const adminId = Number(env.ADMIN_ID);
  if (!Number.isSafeInteger(adminId)) {
    throw new Error(`ADMIN_ID must be a Telegram user id, got "${env.ADMIN_ID}"`);
  }

  return {
    token: env.TOKEN ?? '',
    dbConnectionString: env.DB_CONNECTION_STRING ?? '',
    adminId,
    kiteApiKey: env.KITE_API_KEY ?? '',
    kiteApiSecret: env.KITE_API_SECRET ?? '',
    underlying: env.UNDERLYING?.trim() || 'NIFTY',
    reference: {
      exchange: env.UNDERLYING_EXCHANGE?.trim() || 'NSE',
      symbol: env.UNDERLYING_SYMBOL?.trim() || 'NIFTY 50',
    },
  };
}
