/**
 * Whether a run command is outstanding. Set only by the run lifecycle; cleared
 * by an observed "target reached" prompt (wherever the transport finds it) or
 * by stop.
 */
export class RunState {
  private active = false;
  private completions = 0;
  private onTargetReached: (() => void) | undefined;

  constructor(onTargetReached?: () => void) {
    this.onTargetReached = onTargetReached;
  }

  get running(): boolean {
    return this.active;
  }

  /** Number of "target reached" notices consumed so far. */
  get completedRuns(): number {
    return this.completions;
  }

  begin(): void {
    this.active = true;
  }

  complete(): void {
    this.active = false;
    this.completions++;
    this.onTargetReached?.();
  }

  cancel(): void {
    this.active = false;
  }
}
