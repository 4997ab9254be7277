import type { MergeRecord } from "../merge/types.js";
import type { MergeLedger } from "../ports.js";

/** Append-only merge history; `list` returns oldest first. */
export class InMemoryMergeLedger implements MergeLedger {
  private readonly records: MergeRecord[] = [];

  async record(entry: MergeRecord): Promise<void> {
    this.records.push({ ...entry });
  }

  async list(workspaceId?: string): Promise<MergeRecord[]> {
    return this.records
      .filter((record) => workspaceId === undefined || record.workspaceId === workspaceId)
      .map((record) => ({ ...record }));
  }
}
