interface QueuedJob {
  start: () => void;
}

/**
 * Runs async jobs with at most `maxConcurrency` in flight; the rest wait in
 * submission order.
 */
export class WorkerPool {
  private activeJobs = 0;
  private readonly jobQueue: QueuedJob[] = [];
  readonly maxConcurrency: number;

  constructor(maxConcurrency: number) {
    this.maxConcurrency = Math.max(1, Math.floor(maxConcurrency));
  }

  get active(): number {
    return this.activeJobs;
  }

  get queued(): number {
    return this.jobQueue.length;
  }

  run<T>(job: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const start = () => {
        this.activeJobs += 1;
        Promise.resolve()
          .then(job)
          .then(resolve, reject)
          .finally(() => {
            this.activeJobs -= 1;
            this.processNextJob();
          });
      };
      this.jobQueue.push({ start });
      this.processNextJob();
    });
  }

  private processNextJob(): void {
    while (this.activeJobs < this.maxConcurrency) {
      const next = this.jobQueue.shift();
      if (!next) return;
      next.start();
    }
  }
}
