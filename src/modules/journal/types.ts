import type { OptionType } from '../strangle/types.js';

export type LegRecord = {
  jobId: string;
  leg: OptionType;
  symbol: string;
  quantity: number;
  stopLoss: number;
  orderId: string | null;
  reason: string | null;
  recordedAt: Date;
};
