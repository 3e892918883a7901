import type { Database } from '../database/types.js';
import type { LegRecord } from './types.js';

export async function recordLegAttempt(database: Database, entry: LegRecord): Promise<void> {
  await database.orders.insertOne({ ...entry });
}

export async function findRecentLegs(database: Database, limit = 20): Promise<LegRecord[]> {
  try {
    return await database.orders.find({}, { projection: { _id: 0 } }).sort({ recordedAt: -1 }).limit(limit).toArray();
  } catch (error) {
    console.error('[JOURNAL] Error fetching recent legs:', error);
    return [];
  }
}
