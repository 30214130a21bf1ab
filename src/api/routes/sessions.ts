import type { FastifyPluginAsync } from "fastify";
import { z } from "zod";
import { errorMessage } from "../../errors.js";
import { buildSessionSummary } from "../../services/exportService.js";
import { isValidSessionId } from "../../services/sessionStore.js";
import { SessionAlreadyRunningError, type SessionManager } from "../../workers/sessionManager.js";
import { requireAuth } from "../middleware/auth.js";

const StartSessionSchema = z.object({
  rootHandle: z.string().optional(),
  sessionId: z.string().regex(/^[A-Za-z0-9_-]+$/).optional(),
});

interface SessionParams {
  id: string;
}

export interface SessionRoutesOptions {
  manager: SessionManager;
  apiToken: string | undefined;
  defaultRoot: string;
}

export const sessionRoutes: FastifyPluginAsync<SessionRoutesOptions> = async (
  fastify,
  { manager, apiToken, defaultRoot }
) => {
  fastify.addHook("preHandler", requireAuth(apiToken));

  // LIST - checkpoints, newest first
  fastify.get("/sessions", async () => {
    const sessions = await manager.list();
    return {
      sessions: sessions.map((session) => ({
        ...session,
        running: manager.isRunning(session.sessionId),
      })),
    };
  });

  // READ - summary, groups and failed units (records are in the exports)
  fastify.get<{ Params: SessionParams }>(
    "/sessions/:id",
    async (request, reply) => {
      const { id } = request.params;
      if (!isValidSessionId(id)) {
        return reply.status(400).send({ error: "Invalid session id" });
      }

      try {
        const state = await manager.read(id);
        if (!state) {
          return reply.status(404).send({ error: "Session not found" });
        }

        return {
          summary: buildSessionSummary(state),
          running: manager.isRunning(id),
          progress: manager.progress(id),
          groups: state.completedUnits,
          failedUnits: state.failedUnits,
          inProgressUnits: state.inProgressUnits,
        };
      } catch (error) {
        console.error(`❌ [SESSION_READ_FAILED] session_id=${id} error=${errorMessage(error)}`);
        return reply.status(500).send({ error: "Failed to read session" });
      }
    }
  );

  // START or RESUME - runs in the background
  fastify.post("/sessions", async (request, reply) => {
    const parsed = StartSessionSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      return reply.status(400).send({ error: "Invalid request", details: parsed.error.issues });
    }

    const rootHandle = parsed.data.rootHandle ?? defaultRoot;
    try {
      const sessionId = manager.start(rootHandle, parsed.data.sessionId);
      console.log(`🚀 [SESSION_STARTED] session_id=${sessionId} root=${rootHandle}`);
      return reply.status(202).send({ sessionId, status: "started" });
    } catch (error) {
      if (error instanceof SessionAlreadyRunningError) {
        return reply.status(409).send({ error: error.message });
      }
      throw error;
    }
  });

  // STOP - abandons in-flight groups; they roll back on the next resume
  fastify.post<{ Params: SessionParams }>(
    "/sessions/:id/stop",
    async (request, reply) => {
      const { id } = request.params;
      const stopped = await manager.stop(id);
      if (!stopped) {
        return reply.status(404).send({ error: "Session is not running" });
      }
      console.log(`🛑 [SESSION_STOPPED] session_id=${id}`);
      return { sessionId: id, status: "stopped" };
    }
  );
};
