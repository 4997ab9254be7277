/** Upper bound of the per-branch counter. */
export const MAX_REBASE_HINT = 3;

/**
 * Remembers, per base branch, whether recent merges needed a rebase. A
 * positive counter makes the next merge rebase pre-emptively; clean merges
 * cool the counter down one step at a time.
 */
export class RebaseHints {
  private readonly hints = new Map<string, number>();

  get(baseBranch: string): number {
    return this.hints.get(baseBranch) ?? 0;
  }

  shouldRebaseFirst(baseBranch: string): boolean {
    return this.get(baseBranch) > 0;
  }

  note(baseBranch: string): void {
    this.hints.set(baseBranch, Math.min(this.get(baseBranch) + 1, MAX_REBASE_HINT));
  }

  cooldown(baseBranch: string): void {
    const hint = this.get(baseBranch);
    if (hint <= 1) {
      this.hints.delete(baseBranch);
      return;
    }
    this.hints.set(baseBranch, hint - 1);
  }

  entries(): Array<[string, number]> {
    return [...this.hints.entries()].sort(([left], [right]) => left.localeCompare(right));
  }
}
