import { promises as fs } from "node:fs";
import path from "node:path";
import { v4 as uuidv4 } from "uuid";
import { PersistenceFailure, errorMessage } from "../errors.js";
import { isCountable } from "../types/invoice.js";
import {
  SessionStateSchema,
  SessionStatus,
  type Reconciliation,
  type SessionListing,
  type SessionMetadata,
  type SessionRecord,
  type SessionState,
} from "../types/session.js";
import { type Artifact, commitArtifacts, nodeFileOps, type FileOps } from "../utils/atomicWrite.js";
import { sumAmounts } from "../utils/money.js";
import { SerialQueue } from "../utils/serialQueue.js";
import { defaultExporters, type SessionExporter } from "./exportService.js";

const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]+$/;
const CHECKPOINT_FILE = /^session_(.+)\.json$/;

export interface SessionStoreOptions {
  outputDir: string;
  exporters?: SessionExporter[];
  fileOps?: FileOps;
  now?: () => Date;
}

export type UnitRecordInput = Omit<SessionRecord, "unitId">;

export const isValidSessionId = (sessionId: string): boolean =>
  SESSION_ID_PATTERN.test(sessionId);

const assertValidSessionId = (sessionId: string): void => {
  if (!isValidSessionId(sessionId)) {
    throw new Error(`Invalid session id: ${sessionId}`);
  }
};

// YYYYMMDD_HHMMSS_<8 hex>, UTC
export const generateSessionId = (date: Date): string => {
  const stamp = date.toISOString().replace(/[-:]/g, "").replace("T", "_").slice(0, 15);
  return `${stamp}_${uuidv4().replace(/-/g, "").slice(0, 8)}`;
};

export const checkpointPath = (outputDir: string, sessionId: string): string =>
  path.join(outputDir, "checkpoints", `session_${sessionId}.json`);

const emptyMetadata = (): SessionMetadata => ({
  totalRecords: 0,
  totalLineItems: 0,
  successfulExtractions: 0,
  failedExtractions: 0,
  processingTimeMs: 0,
});

// Counter contribution of a set of records. ERROR records count as failed
// and add no line items.
const countRecords = (records: readonly SessionRecord[]) => ({
  totalRecords: records.length,
  totalLineItems: records
    .filter((record) => isCountable(record.invoice))
    .reduce((sum, record) => sum + record.invoice.totalLineItems, 0),
  successfulExtractions: records.filter((record) => isCountable(record.invoice)).length,
  failedExtractions: records.filter((record) => !isCountable(record.invoice)).length,
});

const withoutUnitRecords = (state: SessionState, unitId: string): SessionState => {
  const removed = state.records.filter((record) => record.unitId === unitId);
  if (removed.length === 0) return state;

  const delta = countRecords(removed);
  return {
    ...state,
    records: state.records.filter((record) => record.unitId !== unitId),
    metadata: {
      ...state.metadata,
      totalRecords: state.metadata.totalRecords - delta.totalRecords,
      totalLineItems: state.metadata.totalLineItems - delta.totalLineItems,
      successfulExtractions: state.metadata.successfulExtractions - delta.successfulExtractions,
      failedExtractions: state.metadata.failedExtractions - delta.failedExtractions,
    },
  };
};

/**
 * Owns one batch session's state and its files under `outputDir`:
 * checkpoints/session_<id>.json plus one derived artifact per exporter.
 * Every mutation computes the next state, persists it, and only then
 * replaces the in-memory state, so a failed save leaves both the files and
 * the state as they were. Mutations run one at a time.
 */
export class SessionStore {
  private state: SessionState | null = null;
  private readonly queue = new SerialQueue();
  private readonly exporters: SessionExporter[];
  private readonly fileOps: FileOps;
  private readonly now: () => Date;

  constructor(private readonly options: SessionStoreOptions) {
    this.exporters = options.exporters ?? defaultExporters();
    this.fileOps = options.fileOps ?? nodeFileOps;
    this.now = options.now ?? (() => new Date());
  }

  get current(): SessionState | null {
    return this.state ? structuredClone(this.state) : null;
  }

  get sessionId(): string | null {
    return this.state?.sessionId ?? null;
  }

  artifactPaths(sessionId: string): { checkpoint: string; exports: Record<string, string> } {
    return {
      checkpoint: checkpointPath(this.options.outputDir, sessionId),
      exports: Object.fromEntries(
        this.exporters.map((exporter) => [
          exporter.name,
          exporter.targetPath(this.options.outputDir, sessionId),
        ])
      ),
    };
  }

  begin(rootHandle: string, sessionId?: string): Promise<SessionState> {
    return this.queue.run(async () => {
      const id = sessionId ?? generateSessionId(this.now());
      assertValidSessionId(id);
      const timestamp = this.now().toISOString();

      const next: SessionState = {
        sessionId: id,
        rootHandle,
        startTime: timestamp,
        lastUpdated: timestamp,
        endTime: null,
        status: SessionStatus.INITIALIZING,
        unitIds: [],
        completedUnits: [],
        failedUnits: [],
        inProgressUnits: [],
        records: [],
        metadata: emptyMetadata(),
      };

      await this.persist(next, false);
      console.log(`🆕 [SESSION_BEGIN] session_id=${id} root=${rootHandle}`);
      return structuredClone(next);
    });
  }

  /**
   * Loads a checkpoint and makes it the current session. Units still marked
   * in progress are rolled back: their records are dropped and the counters
   * reduced, so they can be processed again from scratch.
   */
  load(sessionId: string): Promise<SessionState | null> {
    return this.queue.run(async () => {
      const loaded = await SessionStore.read(this.options.outputDir, sessionId);
      if (!loaded) return null;

      let next = loaded;
      for (const unitId of loaded.inProgressUnits) {
        const dropped = next.records.filter((record) => record.unitId === unitId).length;
        next = withoutUnitRecords(next, unitId);
        console.warn(
          `⏪ [SESSION_ROLLBACK] session_id=${sessionId} unit=${unitId} records_dropped=${dropped}`
        );
      }

      next = {
        ...next,
        inProgressUnits: [],
        status:
          loaded.status === SessionStatus.COMPLETED
            ? SessionStatus.COMPLETED
            : SessionStatus.RESUMED,
        lastUpdated: this.now().toISOString(),
      };

      await this.persist(next, false);
      console.log(
        `🔄 [SESSION_RESUMED] session_id=${sessionId} completed=${next.completedUnits.length} failed=${next.failedUnits.length} records=${next.metadata.totalRecords}`
      );
      return structuredClone(next);
    });
  }

  // Registers the full unit list; ids already known keep their position.
  initializeProcessing(unitIds: readonly string[]): Promise<void> {
    return this.mutate((state) => {
      const known = new Set(state.unitIds);
      return {
        ...state,
        unitIds: [...state.unitIds, ...unitIds.filter((id) => !known.has(id))],
        status:
          state.status === SessionStatus.INITIALIZING ? SessionStatus.PROCESSING : state.status,
      };
    }, false);
  }

  startUnit(unitId: string): Promise<void> {
    return this.mutate((state) => {
      if (state.completedUnits.some((unit) => unit.unitId === unitId)) {
        throw new Error(`Unit ${unitId} is already completed`);
      }
      return {
        ...state,
        unitIds: state.unitIds.includes(unitId) ? state.unitIds : [...state.unitIds, unitId],
        inProgressUnits: state.inProgressUnits.includes(unitId)
          ? state.inProgressUnits
          : [...state.inProgressUnits, unitId],
      };
    }, false);
  }

  completeUnit(
    unitId: string,
    records: readonly UnitRecordInput[],
    durationMs: number,
    reconciliation: Reconciliation | null = null
  ): Promise<void> {
    return this.mutate((state) => {
      if (state.completedUnits.some((unit) => unit.unitId === unitId)) {
        throw new Error(`Unit ${unitId} is already completed`);
      }

      const cleared = withoutUnitRecords(state, unitId);
      const added: SessionRecord[] = records.map((record) => ({ unitId, ...record }));
      const delta = countRecords(added);

      return {
        ...cleared,
        records: [...cleared.records, ...added],
        inProgressUnits: cleared.inProgressUnits.filter((id) => id !== unitId),
        failedUnits: cleared.failedUnits.filter((unit) => unit.unitId !== unitId),
        completedUnits: [
          ...cleared.completedUnits,
          {
            unitId,
            completionTime: this.now().toISOString(),
            itemCount: added.length,
            lineItemCount: delta.totalLineItems,
            durationMs,
            extractedTotal: sumAmounts(
              added
                .filter((record) => isCountable(record.invoice))
                .map((record) => record.invoice.declaredTotal)
            ),
            reconciliation,
          },
        ],
        metadata: {
          totalRecords: cleared.metadata.totalRecords + delta.totalRecords,
          totalLineItems: cleared.metadata.totalLineItems + delta.totalLineItems,
          successfulExtractions:
            cleared.metadata.successfulExtractions + delta.successfulExtractions,
          failedExtractions: cleared.metadata.failedExtractions + delta.failedExtractions,
          processingTimeMs: cleared.metadata.processingTimeMs + durationMs,
        },
      };
    }, true);
  }

  failUnit(unitId: string, error: string): Promise<void> {
    return this.mutate((state) => {
      const cleared = withoutUnitRecords(state, unitId);
      return {
        ...cleared,
        inProgressUnits: cleared.inProgressUnits.filter((id) => id !== unitId),
        failedUnits: [
          ...cleared.failedUnits.filter((unit) => unit.unitId !== unitId),
          { unitId, error, time: this.now().toISOString() },
        ],
      };
    }, true);
  }

  finalize(): Promise<SessionState> {
    return this.queue.run(async () => {
      const state = this.requireState();
      const timestamp = this.now().toISOString();
      const next: SessionState = {
        ...state,
        status: SessionStatus.COMPLETED,
        endTime: timestamp,
        lastUpdated: timestamp,
      };
      await this.persist(next, true);
      console.log(
        `🏁 [SESSION_COMPLETED] session_id=${next.sessionId} completed=${next.completedUnits.length} failed=${next.failedUnits.length} records=${next.metadata.totalRecords}`
      );
      return structuredClone(next);
    });
  }

  async close(): Promise<void> {
    await this.queue.drain();
  }

  static async read(outputDir: string, sessionId: string): Promise<SessionState | null> {
    assertValidSessionId(sessionId);
    const filePath = checkpointPath(outputDir, sessionId);

    let raw: string;
    try {
      raw = await fs.readFile(filePath, "utf8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return null;
      }
      throw new PersistenceFailure(`Cannot read checkpoint ${filePath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new PersistenceFailure(`Checkpoint ${filePath} is not valid JSON`, { cause: error });
    }

    const result = SessionStateSchema.safeParse(parsed);
    if (!result.success) {
      throw new PersistenceFailure(
        `Checkpoint ${filePath} is invalid: ${result.error.issues[0]?.message ?? "unknown"}`
      );
    }
    return result.data;
  }

  // Newest first. Sessions that never reached COMPLETED are resumable.
  static async list(outputDir: string): Promise<SessionListing[]> {
    const directory = path.join(outputDir, "checkpoints");
    let files: string[];
    try {
      files = await fs.readdir(directory);
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") return [];
      throw error;
    }

    const listings: SessionListing[] = [];
    for (const file of files) {
      const sessionId = CHECKPOINT_FILE.exec(file)?.[1];
      if (!sessionId || !isValidSessionId(sessionId)) continue;

      try {
        const state = await SessionStore.read(outputDir, sessionId);
        if (!state) continue;
        listings.push({
          sessionId: state.sessionId,
          status: state.status,
          rootHandle: state.rootHandle,
          startTime: state.startTime,
          lastUpdated: state.lastUpdated,
          completedUnits: state.completedUnits.length,
          failedUnits: state.failedUnits.length,
          totalUnits: state.unitIds.length,
          resumable: state.status !== SessionStatus.COMPLETED,
        });
      } catch (error) {
        console.warn(`⚠️ [SESSION_LIST_SKIPPED] file=${file} error=${errorMessage(error)}`);
      }
    }

    return listings.sort((a, b) => b.startTime.localeCompare(a.startTime));
  }

  private mutate(
    transform: (state: SessionState) => SessionState,
    includeExports: boolean
  ): Promise<void> {
    return this.queue.run(async () => {
      const state = this.requireState();
      const next = {
        ...transform(structuredClone(state)),
        lastUpdated: this.now().toISOString(),
      };
      await this.persist(next, includeExports);
    });
  }

  // In-memory state changes only after every artifact is in place. The
  // checkpoint is moved last, so it never runs ahead of the exports.
  private async persist(next: SessionState, includeExports: boolean): Promise<void> {
    const artifacts: Artifact[] = includeExports
      ? this.exporters.map((exporter) => ({
          name: exporter.name,
          targetPath: exporter.targetPath(this.options.outputDir, next.sessionId),
          render: () => exporter.render(next),
        }))
      : [];
    artifacts.push({
      name: "checkpoint",
      targetPath: checkpointPath(this.options.outputDir, next.sessionId),
      render: () => JSON.stringify(next, null, 2),
    });

    await commitArtifacts(artifacts, path.join(this.options.outputDir, "temp"), this.fileOps);
    this.state = next;
  }

  private requireState(): SessionState {
    if (!this.state) {
      throw new Error("No active session: call begin() or load() first");
    }
    return this.state;
  }
}
