import type { AppConfig } from '../../config/env.js';
import type { KiteClient } from '../kite/client.js';
import { hasExpired, loadInstrumentUniverse } from '../kite/instruments.js';
import { createKiteOrderGateway } from '../kite/orders.js';
import { createKiteMarketGateway } from '../kite/quotes.js';
import { exchangeRequestToken } from '../kite/session.js';
import { StrangleEngine } from './engine.js';
import type { InstrumentUniverse } from './types.js';

/**
 * Owns the broker client and the engine. The engine is built on the first successful
 * session; later logins swap the access token and, once the loaded expiry has passed,
 * the universe used by newly armed jobs. Jobs already armed keep theirs.
 */
export class StrangleDesk {
  private engine: StrangleEngine | null = null;

  constructor(
    private readonly config: AppConfig,
    private readonly client: KiteClient,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async connect(accessToken: string): Promise<StrangleEngine> {
    this.client.setAccessToken(accessToken);
    const today = this.clock();

    if (!this.engine) {
      const universe = await loadInstrumentUniverse(this.client, this.config.underlying, today);
      this.engine = new StrangleEngine({
        universe,
        reference: this.config.reference,
        market: createKiteMarketGateway(this.client),
        orders: createKiteOrderGateway(this.client),
      });
      console.log(`[DESK] Engine ready for ${universe.underlying} ${universe.expiry}`);
      return this.engine;
    }

    const current = this.engine.getUniverse();
    if (hasExpired(current, today)) {
      const universe = await loadInstrumentUniverse(this.client, this.config.underlying, today);
      this.engine.replaceUniverse(universe);
      console.log(`[DESK] ${current.underlying} ${current.expiry} expired, rolled to ${universe.expiry}`);
    }
    return this.engine;
  }

  /** Exchanges a request token and connects; returns the access token to persist. */
  async login(requestToken: string): Promise<{ accessToken: string; universe: InstrumentUniverse }> {
    const accessToken = await exchangeRequestToken(this.client, requestToken, this.config.kiteApiSecret);
    const engine = await this.connect(accessToken);
    return { accessToken, universe: engine.getUniverse() };
  }

  loginUrl(): string {
    return this.client.getLoginURL();
  }

  getEngine(): StrangleEngine | null {
    return this.engine;
  }
}
