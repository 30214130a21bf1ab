import Fastify from "fastify";
import { appConfig } from "../config.js";
import type { SessionManager } from "../workers/sessionManager.js";
import { sessionRoutes } from "./routes/sessions.js";

export interface ServerOptions {
  manager: SessionManager;
  defaultRoot: string;
  apiToken?: string;
  logger?: boolean;
}

export const createServer = (options: ServerOptions) => {
  const fastify = Fastify({
    logger: options.logger ?? appConfig.nodeEnv === "development",
  });

  // Health check
  fastify.get("/health", async () => {
    return { status: "ok", timestamp: new Date().toISOString() };
  });

  fastify.register(sessionRoutes, {
    manager: options.manager,
    apiToken: options.apiToken ?? appConfig.apiToken,
    defaultRoot: options.defaultRoot,
  });

  return fastify;
};
