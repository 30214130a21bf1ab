import { errorMessage } from "../errors.js";
import type { ConcurrencyController } from "../services/concurrencyController.js";
import {
  DEFAULT_THRESHOLDS,
  reconcileGroup,
  type ReconciliationThresholds,
} from "../services/reconciliation.js";
import type { ReferenceValueSource } from "../services/referenceService.js";
import type { SessionStore } from "../services/sessionStore.js";
import type { DocumentSource } from "../services/storageService.js";
import type { ParentGroupListing } from "../types/document.js";
import type { SessionState } from "../types/session.js";
import type { Amount } from "../utils/money.js";
import type { DocumentProcessor } from "./documentProcessor.js";

export interface BatchRunnerOptions {
  source: DocumentSource;
  processor: DocumentProcessor;
  store: SessionStore;
  reference: ReferenceValueSource | null;
  // Bounds parent groups in flight
  groupLimiter: ConcurrencyController;
  thresholds?: ReconciliationThresholds;
}

export interface BatchProgress {
  sessionId: string;
  unitId: string;
  outcome: "completed" | "failed";
  completed: number;
  failed: number;
  total: number;
}

export interface BatchRunOptions {
  rootHandle: string;
  // Resumes this session when a checkpoint exists, otherwise starts it
  sessionId?: string;
  signal?: AbortSignal;
  onProgress?: (progress: BatchProgress) => void;
}

export interface BatchRunResult {
  sessionId: string;
  // incomplete: some unit could not be recorded; the session stays resumable
  status: "completed" | "aborted" | "incomplete";
  skippedUnits: string[];
  state: SessionState;
}

export class BatchRunner {
  private readonly thresholds: ReconciliationThresholds;

  constructor(private readonly options: BatchRunnerOptions) {
    this.thresholds = options.thresholds ?? DEFAULT_THRESHOLDS;
  }

  async run(runOptions: BatchRunOptions): Promise<BatchRunResult> {
    const { store, source } = this.options;
    const { signal } = runOptions;

    const resumed = runOptions.sessionId ? await store.load(runOptions.sessionId) : null;
    const session = resumed ?? (await store.begin(runOptions.rootHandle, runOptions.sessionId));
    const sessionId = session.sessionId;
    // A resumed session keeps the root it was started with
    const rootHandle = session.rootHandle;

    const groups = await source.listGroups(rootHandle);
    await store.initializeProcessing(groups.map((group) => group.id));

    const settled = new Set([
      ...session.completedUnits.map((unit) => unit.unitId),
      ...session.failedUnits.map((unit) => unit.unitId),
    ]);
    const pending = groups.filter((group) => !settled.has(group.id));
    const skippedUnits = groups.filter((group) => settled.has(group.id)).map((group) => group.id);

    console.log(
      `🚀 [BATCH_START] session_id=${sessionId} root=${rootHandle} groups=${groups.length} pending=${pending.length} skipped=${skippedUnits.length}`
    );

    const outcomes = await Promise.allSettled(
      pending.map((group) =>
        this.options.groupLimiter.run(() => this.runGroup(sessionId, group, runOptions), signal)
      )
    );

    if (signal?.aborted) {
      console.warn(
        `🛑 [BATCH_ABORTED] session_id=${sessionId} in_progress_units_will_roll_back_on_resume`
      );
      return {
        sessionId,
        status: "aborted",
        skippedUnits,
        state: this.snapshot(),
      };
    }

    for (const outcome of outcomes) {
      if (outcome.status === "rejected") {
        console.error(
          `❌ [BATCH_GROUP_ERROR] session_id=${sessionId} error=${errorMessage(outcome.reason)}`
        );
      }
    }

    const current = this.snapshot();
    const recorded = new Set([
      ...current.completedUnits.map((unit) => unit.unitId),
      ...current.failedUnits.map((unit) => unit.unitId),
    ]);
    const unrecorded = groups
      .map((group) => group.id)
      .filter((unitId) => !recorded.has(unitId));
    if (unrecorded.length > 0) {
      console.error(
        `⚠️ [BATCH_INCOMPLETE] session_id=${sessionId} unrecorded=${unrecorded.join(",")} not_finalized`
      );
      return { sessionId, status: "incomplete", skippedUnits, state: current };
    }

    const state = await store.finalize();
    return { sessionId, status: "completed", skippedUnits, state };
  }

  private async runGroup(
    sessionId: string,
    group: ParentGroupListing,
    runOptions: BatchRunOptions
  ): Promise<void> {
    const { store, source, processor } = this.options;
    const { signal } = runOptions;
    signal?.throwIfAborted();

    const startTime = Date.now();

    let outcome: BatchProgress["outcome"];
    try {
      await store.startUnit(group.id);
      const documents = await source.listDocuments(group);
      if (documents.length === 0) {
        throw new Error(`No PDF documents found for ${group.id}`);
      }

      console.log(
        `📦 [GROUP_START] session_id=${sessionId} group=${group.id} documents=${documents.length}`
      );

      const results = await Promise.allSettled(
        documents.map((document) =>
          processor.process(
            { parentId: group.id, documentHandle: document.handle, displayName: document.name },
            signal
          )
        )
      );
      // Abandon without committing; the in-progress marker stays for rollback
      signal?.throwIfAborted();

      const records = results.map((result, index) => {
        if (result.status === "rejected") throw result.reason;
        return { documentHandle: documents[index].handle, invoice: result.value };
      });

      const referenceTotal = await this.lookupReference(group.id);
      const reconciliation = reconcileGroup(
        group.id,
        records.map((record) => record.invoice),
        referenceTotal,
        this.thresholds
      );

      await store.completeUnit(group.id, records, Date.now() - startTime, reconciliation);
      outcome = "completed";
      console.log(
        `✅ [GROUP_COMPLETED] session_id=${sessionId} group=${group.id} documents=${records.length} total=${reconciliation.extractedTotal} status=${reconciliation.status}`
      );
    } catch (error) {
      if (signal?.aborted) throw error;

      console.error(
        `❌ [GROUP_FAILED] session_id=${sessionId} group=${group.id} error=${errorMessage(error)}`
      );
      await store.failUnit(group.id, errorMessage(error));
      outcome = "failed";
    }

    const state = this.snapshot();
    runOptions.onProgress?.({
      sessionId,
      unitId: group.id,
      outcome,
      completed: state.completedUnits.length,
      failed: state.failedUnits.length,
      total: state.unitIds.length,
    });
  }

  // A failed lookup reconciles as MISSING_REFERENCE rather than failing the group.
  private async lookupReference(parentId: string): Promise<Amount | null> {
    const reference = this.options.reference;
    if (!reference) return null;

    try {
      return await reference.lookup(parentId);
    } catch (error) {
      console.warn(
        `⚠️ [REFERENCE_LOOKUP_FAILED] source=${reference.name} group=${parentId} error=${errorMessage(error)}`
      );
      return null;
    }
  }

  private snapshot(): SessionState {
    const state = this.options.store.current;
    if (!state) {
      throw new Error("Session store has no active session");
    }
    return state;
  }
}
