export type ProgressStep = {
  stage: string;
  message: string;
  delayMs: number;
};

const STAGE_MESSAGES: ReadonlyArray<readonly [string, string]> = [
  ["generating", "Generating analysis code for the image"],
  ["executing", "Executing analysis code in the sandbox"],
  ["verifying", "Verifying counts against detected objects"],
];

/** Pairs the configured delays with the fixed stage names, in order. */
export function buildProgressSteps(delaysMs: readonly number[]): ProgressStep[] {
  const steps: ProgressStep[] = [];
  STAGE_MESSAGES.forEach(([stage, message], index) => {
    const delayMs = delaysMs[index];
    if (delayMs !== undefined) {
      steps.push({ stage, message, delayMs });
    }
  });
  return steps;
}

/**
 * Emits synthetic progress on a fixed schedule while a slow call is pending.
 * After `stop()` no further step is emitted.
 */
export class ProgressTicker {
  private readonly timers = new Set<NodeJS.Timeout>();
  private stopped = false;

  constructor(
    private readonly steps: readonly ProgressStep[],
    private readonly emit: (step: ProgressStep, index: number, total: number) => void,
  ) {}

  start(): void {
    this.steps.forEach((step, index) => {
      const timer = setTimeout(() => {
        this.timers.delete(timer);
        if (this.stopped) {
          return;
        }
        this.emit(step, index, this.steps.length);
      }, step.delayMs);
      timer.unref();
      this.timers.add(timer);
    });
  }

  stop(): void {
    this.stopped = true;
    for (const timer of this.timers) {
      clearTimeout(timer);
    }
    this.timers.clear();
  }
}
