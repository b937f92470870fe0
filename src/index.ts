import dotenv from "dotenv";
dotenv.config();

import { createLogger } from "./utils/logger";
import { loadEnv } from "./utils/env";
import { IntentResolver } from "./llm/client";
import { SpotifyTokenStore } from "./spotify/tokens";
import { SpotifyWebClient } from "./spotify/api";
import { SpotifySession } from "./spotify/session";
import { ActionDispatcher } from "./dispatch/dispatcher";
import { CommandPipeline } from "./gateway/pipeline";
import { createGateway } from "./gateway/server";

async function main() {
  const env = loadEnv();
  const logger = createLogger(env.LOG_LEVEL);

  if (!env.SPOTIFY_CLIENT_ID || !env.SPOTIFY_CLIENT_SECRET || !env.SPOTIFY_REDIRECT_URI) {
    logger.warn("Spotify credentials incomplete; token refresh will fail", {
      clientId: env.SPOTIFY_CLIENT_ID ? "set" : "missing",
      clientSecret: env.SPOTIFY_CLIENT_SECRET ? "set" : "missing",
      redirectUri: env.SPOTIFY_REDIRECT_URI ?? "missing",
    });
  }

  const tokens = new SpotifyTokenStore(
    {
      cachePath: env.SPOTIFY_TOKEN_CACHE,
      clientId: env.SPOTIFY_CLIENT_ID,
      clientSecret: env.SPOTIFY_CLIENT_SECRET,
    },
    logger.child({ component: "spotify-auth" })
  );
  const spotify = new SpotifySession(new SpotifyWebClient(tokens), logger.child({ component: "spotify" }));
  const dispatcher = new ActionDispatcher(spotify, logger.child({ component: "dispatcher" }));
  const resolver = IntentResolver.fromEnv(env, logger.child({ component: "llm" }));
  const pipeline = new CommandPipeline(resolver, dispatcher, logger);
  const gateway = createGateway(pipeline, logger);

  const address = await gateway.listen(env.PORT, env.HOST);
  logger.info("Voice assistant gateway listening", {
    host: address.address,
    port: address.port,
    model: env.LLM_MODEL,
  });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down...`);
    await gateway.close();
    spotify.close();
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err) => {
      logger.error("Shutdown failed", { message: String(err) });
      process.exit(1);
    });
  };
  process.on("SIGINT", () => onSignal("SIGINT"));
  process.on("SIGTERM", () => onSignal("SIGTERM"));
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});
