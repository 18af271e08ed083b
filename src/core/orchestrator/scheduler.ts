// src/core/orchestrator/scheduler.ts
// Runs a DAG of tasks under a concurrency limit

export type TaskOutcome<R> =
  | { tag: "done"; value: R }
  | { tag: "failed"; error: unknown }
  | { tag: "cancelled" };

export interface DagTask<R> {
  id: string;
  /** Ids of tasks this one waits for; ids outside the batch count as settled */
  after: readonly string[];
  run: () => Promise<R>;
}

export interface DagScheduleOptions {
  maxConcurrency: number;
  /** Checked before each start; once true nothing new starts */
  isCancelled?: () => boolean;
}

/**
 * Start each task once every task it waits for has settled, at most
 * `maxConcurrency` at a time, preferring earlier tasks in `tasks` order.
 * Tasks never started because of cancellation settle as `cancelled`.
 */
export function runDag<R>(tasks: readonly DagTask<R>[], options: DagScheduleOptions): Promise<Map<string, TaskOutcome<R>>> {
  const limit = Math.max(1, Math.floor(options.maxConcurrency));
  const isCancelled = options.isCancelled ?? (() => false);
  const batch = new Set(tasks.map((t) => t.id));
  const outcomes = new Map<string, TaskOutcome<R>>();
  const waiting = [...tasks];
  let running = 0;

  return new Promise((resolve, reject) => {
    const pump = (): void => {
      if (isCancelled()) {
        for (const t of waiting) outcomes.set(t.id, { tag: "cancelled" });
        waiting.length = 0;
      }

      let i = 0;
      while (i < waiting.length && running < limit) {
        const task = waiting[i];
        const ready = task.after.every((d) => !batch.has(d) || outcomes.has(d));
        if (!ready) {
          i++;
          continue;
        }
        waiting.splice(i, 1);
        running++;
        task
          .run()
          .then(
            (value): TaskOutcome<R> => ({ tag: "done", value }),
            (error: unknown): TaskOutcome<R> => ({ tag: "failed", error })
          )
          .then((outcome) => {
            outcomes.set(task.id, outcome);
            running--;
            pump();
          })
          .catch(reject);
      }

      if (running === 0) {
        if (waiting.length === 0) {
          resolve(outcomes);
        } else {
          reject(new Error(`Scheduler stalled with ${waiting.length} task(s) waiting: ${waiting.map((t) => t.id).join(", ")}`));
        }
      }
    };

    pump();
  });
}
