import { errorMessage } from "../errors.js";
import { SessionStore, generateSessionId, isValidSessionId } from "../services/sessionStore.js";
import type { SessionListing, SessionState } from "../types/session.js";
import type { BatchProgress, BatchRunOptions, BatchRunResult } from "./batchRunner.js";

export type RunLauncher = (options: BatchRunOptions) => Promise<BatchRunResult>;

interface ActiveRun {
  controller: AbortController;
  done: Promise<void>;
  progress: BatchProgress | null;
}

export class SessionAlreadyRunningError extends Error {
  constructor(sessionId: string) {
    super(`Session ${sessionId} is already running`);
    this.name = "SessionAlreadyRunningError";
  }
}

/**
 * Starts batch runs in the background and keeps a handle per running session
 * so it can be stopped. Finished sessions are read back from their
 * checkpoints.
 */
export class SessionManager {
  private readonly active = new Map<string, ActiveRun>();

  constructor(
    private readonly outputDir: string,
    private readonly launch: RunLauncher
  ) {}

  start(rootHandle: string, sessionId?: string): string {
    const id = sessionId ?? generateSessionId(new Date());
    if (!isValidSessionId(id)) {
      throw new Error(`Invalid session id: ${id}`);
    }
    if (this.active.has(id)) {
      throw new SessionAlreadyRunningError(id);
    }

    const controller = new AbortController();
    const run: ActiveRun = { controller, done: Promise.resolve(), progress: null };

    run.done = this.launch({
      rootHandle,
      sessionId: id,
      signal: controller.signal,
      onProgress: (progress) => {
        run.progress = progress;
      },
    })
      .then((result) => {
        console.log(
          `🏁 [SESSION_RUN_FINISHED] session_id=${result.sessionId} status=${result.status}`
        );
      })
      .catch((error: unknown) => {
        console.error(`❌ [SESSION_RUN_FAILED] session_id=${id} error=${errorMessage(error)}`);
      })
      .finally(() => {
        this.active.delete(id);
      });

    this.active.set(id, run);
    return id;
  }

  // Returns false when the session is not running in this process.
  async stop(sessionId: string): Promise<boolean> {
    const run = this.active.get(sessionId);
    if (!run) return false;

    run.controller.abort(new Error("Stopped by request"));
    await run.done;
    return true;
  }

  isRunning(sessionId: string): boolean {
    return this.active.has(sessionId);
  }

  progress(sessionId: string): BatchProgress | null {
    return this.active.get(sessionId)?.progress ?? null;
  }

  list(): Promise<SessionListing[]> {
    return SessionStore.list(this.outputDir);
  }

  read(sessionId: string): Promise<SessionState | null> {
    return SessionStore.read(this.outputDir, sessionId);
  }

  async stopAll(): Promise<void> {
    await Promise.all([...this.active.keys()].map((id) => this.stop(id)));
  }
}
