import type { Collection } from 'mongodb';
import type { LegRecord } from '../journal/types.js';
import type { User } from '../user/types.js';

export type Database = {
  user: Collection<User>;
  orders: Collection<LegRecord>;
};
