import { artifactId } from "./artifact-store.js";
import type { ArtifactRecord, ArtifactStore, StoredArtifact } from "./artifact-store.js";

/** In-process store. Records are deep-copied on the way in and on the way out. */
export class MemoryArtifactStore implements ArtifactStore {
  private readonly records: (StoredArtifact & { record: ArtifactRecord })[] = [];

  constructor(private readonly now: () => Date = () => new Date()) {}

  async put(record: ArtifactRecord): Promise<string> {
    const seq = this.records.filter((r) => r.record.runId === record.runId).length + 1;
    const id = artifactId(record.runId, seq, record.kind);
    this.records.push({ id, seq, storedAt: this.now().toISOString(), record: structuredClone(record) });
    return id;
  }

  async list(runId: string): Promise<StoredArtifact[]> {
    return structuredClone(this.records.filter((r) => r.record.runId === runId));
  }

  /** Typed records of one kind, in insertion order. */
  ofKind<K extends ArtifactRecord["kind"]>(runId: string, kind: K): Extract<ArtifactRecord, { kind: K }>[] {
    return structuredClone(
      this.records.flatMap((r) => (r.record.runId === runId && isKind(r.record, kind) ? [r.record] : [])),
    );
  }
}

function isKind<K extends ArtifactRecord["kind"]>(
  record: ArtifactRecord,
  kind: K,
): record is Extract<ArtifactRecord, { kind: K }> {
  return record.kind === kind;
}
