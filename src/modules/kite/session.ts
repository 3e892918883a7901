import { SessionRejectedError, describeError } from '../strangle/errors.js';
import type { KiteClient } from './client.js';

export async function exchangeRequestToken(client: KiteClient, requestToken: string, apiSecret: string): Promise<string> {
  try {
    const session = await client.generateSession(requestToken, apiSecret);
    return session.access_token;
  } catch (error) {
    console.error('[KITE] Session exchange failed:', error);
    throw new SessionRejectedError(describeError(error), { cause: error });
  }
}
