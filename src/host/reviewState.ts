export interface ReviewRecord {
  taskId: string;
  requestedAt: string | null;
  approved: boolean;
  approvedBy: string | null;
  approvedAt: string | null;
}

/** Review approvals per task, kept for the lifetime of the host. */
export class ReviewApprovals {
  private readonly records = new Map<string, ReviewRecord>();
  private readonly now: () => Date;

  constructor(now: () => Date = () => new Date()) {
    this.now = now;
  }

  requested(taskId: string): ReviewRecord {
    const record: ReviewRecord = {
      taskId,
      requestedAt: this.now().toISOString(),
      approved: false,
      approvedBy: null,
      approvedAt: null,
    };
    this.records.set(taskId, record);
    return { ...record };
  }

  approve(taskId: string, sessionId: string): ReviewRecord {
    const record: ReviewRecord = {
      taskId,
      requestedAt: this.records.get(taskId)?.requestedAt ?? null,
      approved: true,
      approvedBy: sessionId,
      approvedAt: this.now().toISOString(),
    };
    this.records.set(taskId, record);
    return { ...record };
  }

  isApproved(taskId: string): boolean {
    return this.records.get(taskId)?.approved ?? false;
  }

  get(taskId: string): ReviewRecord | null {
    const record = this.records.get(taskId);
    return record ? { ...record } : null;
  }

  clear(taskId: string): void {
    this.records.delete(taskId);
  }
}
