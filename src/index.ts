import type { IRequest } from "itty-router";
import type { AppEnv } from "./env.ts";
import type { AuctionRouter } from "./routes/context.ts";

import { AutoRouter } from "itty-router";
import { handleError, notFound } from "./web/index.ts";
import { registerAuthRoutes } from "./routes/auth.ts";
import { registerLotRoutes } from "./routes/lots.ts";
import { registerAssetRoutes } from "./routes/assets.ts";

/**
 * Build the application router. Handlers receive the AppEnv as their second
 * argument: `router.fetch(request, env)`.
 */
export function createRouter(): AuctionRouter {
  const router = AutoRouter<IRequest, [AppEnv]>({
    // Thrown HttpErrors become their status page; anything else is a 500
    catch: (err: unknown, _request: IRequest, env: AppEnv) => handleError(env, err),
    finally: [
      (response: Response, request: IRequest, env: AppEnv) => {
        env.logger.info("http:request", {
          method: request.method,
          path: new URL(request.url).pathname,
          status: response.status,
        });
      },
    ],
  });

  registerAssetRoutes(router);
  registerAuthRoutes(router);
  registerLotRoutes(router);

  // Catch-all 404
  router.all("*", () => {
    throw notFound();
  });

  return router;
}

export type { AppEnv } from "./env.ts";
export { getConfig } from "./config.ts";
export { openDatabase } from "./db/client.ts";
export { createLogger } from "./common/logger.ts";
