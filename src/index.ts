import { createServer } from "./api/server.js";
import { appConfig } from "./config.js";
import { createPipeline } from "./pipeline.js";
import { SessionManager } from "./workers/sessionManager.js";

const startServer = async () => {
  try {
    const pipeline = createPipeline();
    const manager = new SessionManager(pipeline.outputDir, (options) => pipeline.run(options));
    const fastify = createServer({ manager, defaultRoot: pipeline.defaultRoot });

    if (!appConfig.apiToken) {
      console.warn("⚠️ API_TOKEN is not set, /sessions routes will reject every request");
    }

    //  Start server
    const address = await fastify.listen({
      port: appConfig.port,
      host: appConfig.host,
    });

    console.log(`🚀 Server running at ${address}`);
    console.log(`📁 Exports: ${pipeline.outputDir}`);

    const gracefulShutdown = async (signal: string) => {
      console.log(`\n🛑 Received ${signal}, shutting down gracefully...`);

      try {
        await fastify.close();
        console.log("✅ Fastify server closed");

        await manager.stopAll();
        console.log("✅ Running sessions stopped");

        await pipeline.close();
        console.log("✅ Pipeline closed");

        process.exit(0);
      } catch (error) {
        console.error("❌ Error during shutdown:", error);
        process.exit(1);
      }
    };

    process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
    process.on("SIGINT", () => void gracefulShutdown("SIGINT"));
  } catch (error) {
    console.error("💥 Failed to start server:", error);
    process.exit(1);
  }
};

void startServer();
