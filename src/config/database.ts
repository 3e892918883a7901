import { MongoClient } from 'mongodb';

import type { Database } from '../modules/database/types.js';
import type { LegRecord } from '../modules/journal/types.js';
import type { User } from '../modules/user/types.js';

export async function connectToDb(connectionString: string) {
  const client = new MongoClient(connectionString);
  await client.connect();
  const mongoDb = client.db();
  const user = mongoDb.collection<User>('user');
  const orders = mongoDb.collection<LegRecord>('orders');
  const database: Database = { user, orders };
  return database;
}
