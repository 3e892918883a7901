import type { Database } from '../database/types.js';
import type { User } from './types.js';

export async function findUserById(database: Database, userId: number): Promise<User | null> {
  try {
    return await database.user.findOne({ userId });
  } catch (error) {
    console.error('[USER-DATA] Error finding user by ID:', error);
    return null;
  }
}

export async function saveAccessToken(database: Database, userId: number, accessToken: string): Promise<void> {
  await database.user.updateOne(
    { userId },
    { $set: { accessToken, updatedAt: new Date() } },
    { upsert: true },
  );
}
