import type { AppConfig } from "./config.ts";
import type { AuctionDb } from "./db/client.ts";
import type { Logger } from "./common/logger.ts";

/**
 * Everything a request handler may touch, passed explicitly as the second
 * argument of `router.fetch(request, env)`.
 */
export interface AppEnv {
  config: AppConfig;
  db: AuctionDb;
  logger: Logger;
  /** Current time; tests pin it. */
  clock: () => Date;
}
