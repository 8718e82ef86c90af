import fs from "node:fs";
import path from "node:path";
import pino from "pino";
import writeFileAtomic from "write-file-atomic";
import { z } from "zod";
import { ArtifactStoreError, isSafeRunId } from "../lib/errors.js";
import { ARTIFACT_KINDS, artifactId } from "./artifact-store.js";
import type { ArtifactRecord, ArtifactStore, StoredArtifact } from "./artifact-store.js";

const AUDIT_FILE = "audit.ndjson";

const StoredArtifactSchema = z.object({
  id: z.string(),
  seq: z.number().int(),
  storedAt: z.string(),
  record: z.object({ kind: z.enum(ARTIFACT_KINDS), runId: z.string(), payload: z.unknown() }),
});

/**
 * One JSON file per record under `<rootDir>/<runId>/`, written atomically, plus
 * an NDJSON audit line per record in `<rootDir>/audit.ndjson`. Call `close()`
 * when done to release the audit file.
 */
export class FileArtifactStore implements ArtifactStore {
  private readonly audit: pino.Logger;
  private readonly auditDest: ReturnType<typeof pino.destination>;
  private readonly counters = new Map<string, number>();

  constructor(
    private readonly rootDir: string,
    private readonly now: () => Date = () => new Date(),
  ) {
    fs.mkdirSync(rootDir, { recursive: true });
    this.auditDest = pino.destination({ dest: path.join(rootDir, AUDIT_FILE), sync: true, append: true });
    this.audit = pino(
      {
        base: undefined,
        level: "info",
        formatters: { level: () => ({ ts: this.now().toISOString() }) },
        timestamp: false,
      },
      this.auditDest,
    );
  }

  async put(record: ArtifactRecord): Promise<string> {
    const runDir = this.runDir(record.runId);
    fs.mkdirSync(runDir, { recursive: true });

    const seq = this.nextSeq(record.runId, runDir);
    const id = artifactId(record.runId, seq, record.kind);
    const stored: StoredArtifact = { id, seq, storedAt: this.now().toISOString(), record };
    await writeFileAtomic(path.join(this.rootDir, `${id}.json`), JSON.stringify(stored, null, 2), "utf8");

    this.audit.info({ id, runId: record.runId, kind: record.kind }, "artifact stored");
    return id;
  }

  async list(runId: string): Promise<StoredArtifact[]> {
    const runDir = this.runDir(runId);
    if (!fs.existsSync(runDir)) return [];

    const files = fs.readdirSync(runDir).filter((f) => f.endsWith(".json")).sort();
    return files.map((file) => {
      const json: unknown = JSON.parse(fs.readFileSync(path.join(runDir, file), "utf8"));
      const { id, seq, storedAt, record } = StoredArtifactSchema.parse(json);
      return { id, seq, storedAt, record: { kind: record.kind, runId: record.runId, payload: record.payload } };
    });
  }

  /** Flushes and closes the audit file. The store must not be used afterwards. */
  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.auditDest.once("close", () => resolve());
      this.auditDest.once("error", reject);
      this.auditDest.end();
    });
  }

  private runDir(runId: string): string {
    if (!isSafeRunId(runId)) {
      throw new ArtifactStoreError(`Unsafe run id ${JSON.stringify(runId)}`);
    }
    return path.join(this.rootDir, runId);
  }

  private nextSeq(runId: string, runDir: string): number {
    const known = this.counters.get(runId) ?? fs.readdirSync(runDir).filter((f) => f.endsWith(".json")).length;
    const seq = known + 1;
    this.counters.set(runId, seq);
    return seq;
  }
}
