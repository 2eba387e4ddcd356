import type { Clock } from "../src/core/clock.js";
import { MemoryStore } from "../src/db/memoryStore.js";
import type { EscortRow, UserRow } from "../src/db/types.js";
import { createMarketplace, type Marketplace } from "../src/market/marketplace.js";
import type { MarketSettings } from "../src/market/settings.js";

export const T0 = "2024-05-01T10:00:00.000Z";
export const HOUR = 3600 * 1000;

export function makeClock(start = T0) {
  let now = new Date(start).getTime();
  const clock: Clock = () => new Date(now);
  return {
    clock,
    advance(ms: number) {
      now += ms;
    }
  };
}

export function setup(settings: Partial<MarketSettings> = {}) {
  const store = new MemoryStore({ lockTimeoutMs: 500 });
  const time = makeClock();
  const market = createMarketplace({
    store,
    settings: { conflictBackoffMs: 1, ...settings },
    clock: time.clock
  });
  return { store, market, time };
}

export type Worker = { user: UserRow; escort: EscortRow };

/** Registered, enrolled worker with rules accepted and a game account. */
export async function seedWorker(market: Marketplace, telegramId: number, squadId?: number): Promise<Worker> {
  const user = await market.registerUser({ telegramId, username: `worker${telegramId}` });
  const enrolled = await market.enrollWorker({ userId: user.id });
  await market.acceptRules({ escortId: enrolled.id });
  let escort = await market.setGameAccount({ escortId: enrolled.id, gameAccountId: String(10_000_000 + telegramId) });
  if (squadId !== undefined) escort = await market.addToSquad({ squadId, escortId: escort.id });
  return { user, escort };
}

export async function seedOrder(market: Marketplace, memoOrderId: string, amount: number) {
  return market.createOrder({ memoOrderId, amount, customerInfo: "ranked push" });
}
