#!/usr/bin/env node
import { createPipeline } from "./pipeline.js";
import { buildSessionSummary } from "./services/exportService.js";
import { SessionStore } from "./services/sessionStore.js";

// Usage: worker [rootHandle] [sessionId]
//        worker --list
const startWorker = async () => {
  const args = process.argv.slice(2);
  const pipeline = createPipeline();

  if (args[0] === "--list") {
    const sessions = await SessionStore.list(pipeline.outputDir);
    for (const session of sessions) {
      console.log(
        `${session.resumable ? "⏸️ " : "✅"} ${session.sessionId} status=${session.status} groups=${session.completedUnits}/${session.totalUnits} failed=${session.failedUnits} root=${session.rootHandle}`
      );
    }
    await pipeline.close();
    return;
  }

  const rootHandle = args[0] || process.env.DOCUMENT_ROOT || pipeline.defaultRoot;
  const sessionId = args[1] || process.env.RESUME_SESSION_ID || undefined;
  const controller = new AbortController();

  const gracefulShutdown = (signal: string) => {
    if (controller.signal.aborted) {
      console.log(`\n💥 Received ${signal} again, exiting immediately`);
      process.exit(130);
    }
    console.log(`\n🛑 Received ${signal}, stopping after in-flight writes...`);
    controller.abort(new Error(`Interrupted by ${signal}`));
  };

  process.on("SIGTERM", () => gracefulShutdown("SIGTERM"));
  process.on("SIGINT", () => gracefulShutdown("SIGINT"));

  console.log("🔧 Starting batch extraction...");
  console.log(`   Root: ${rootHandle}`);
  if (sessionId) console.log(`   Session: ${sessionId}`);

  try {
    const result = await pipeline.run({
      rootHandle,
      sessionId,
      signal: controller.signal,
      onProgress: (progress) => {
        console.log(
          `📊 [PROGRESS] ${progress.completed + progress.failed}/${progress.total} group=${progress.unitId} outcome=${progress.outcome}`
        );
      },
    });

    const summary = buildSessionSummary(result.state);
    const stats = pipeline.processor.stats();
    console.log(`\n📋 Session ${result.sessionId} ${result.status}`);
    console.log(`   Groups: ${summary.completedUnits} completed, ${summary.failedUnits} failed, ${summary.pendingUnits} pending`);
    console.log(`   Documents: ${summary.totalRecords} (${summary.successRate}% extracted)`);
    console.log(`   Line items: ${summary.totalLineItems}, total ${summary.extractedTotal}`);
    console.log(
      `   Cache hits: ${stats.cacheHits}, primary: ${stats.primary}, fallback: ${stats.fallback}, errors: ${stats.errors}`
    );
    if (result.status !== "completed") {
      console.log(`   Resume with: worker ${rootHandle} ${result.sessionId}`);
    }

    await pipeline.close();
    process.exit(result.status === "aborted" ? 130 : result.status === "incomplete" ? 1 : 0);
  } catch (error) {
    console.error("💥 Batch run failed:", error);
    await pipeline.close();
    process.exit(1);
  }
};

startWorker().catch((error: unknown) => {
  console.error("💥 Failed to start worker:", error);
  process.exit(1);
});
