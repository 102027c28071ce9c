import { describeError, throwIfAborted } from '../core/errors';
import { createLogger } from '../core/log';

const log = createLogger('round/tasks');

type TrackedTask = {
  label: string;
  controller: AbortController;
  promise: Promise<void>;
};

export type RoundTask = (signal: AbortSignal) => Promise<unknown>;

function nextTurn(): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, 0);
  });
}

/**
 * Owns detached network work per round. Failures are logged here and never
 * reach the caller that scheduled the task. A task starts on the next turn
 * of the event loop, so a cancel issued right after scheduling means it
 * never runs.
 */
export class RoundTaskQueue {
  private readonly tasks = new Map<number, Set<TrackedTask>>();

  run(roundId: number, label: string, task: RoundTask): Promise<void> {
    const controller = new AbortController();
    const bucket = this.tasks.get(roundId) ?? new Set<TrackedTask>();
    this.tasks.set(roundId, bucket);

    const tracked: TrackedTask = {
      label,
      controller,
      promise: nextTurn()
        .then(() => {
          throwIfAborted(controller.signal, label);
          return task(controller.signal);
        })
        .then(
          () => undefined,
          (error: unknown) => {
            if (controller.signal.aborted) {
              log.info(`${label} cancelled`, { roundId });
              return;
            }
            log.warn(`${label} failed`, { roundId, error: describeError(error) });
          },
        )
        .finally(() => {
          bucket.delete(tracked);
          if (!bucket.size && this.tasks.get(roundId) === bucket) {
            this.tasks.delete(roundId);
          }
        }),
    };
    bucket.add(tracked);
    return tracked.promise;
  }

  pending(roundId: number): string[] {
    return [...(this.tasks.get(roundId) ?? [])].map((task) => task.label);
  }

  cancel(roundId: number): void {
    for (const task of this.tasks.get(roundId) ?? []) {
      task.controller.abort();
    }
  }

  cancelAll(): void {
    for (const roundId of this.tasks.keys()) {
      this.cancel(roundId);
    }
  }

  /** Resolves when every task scheduled so far (for one round, or all) has settled. */
  async idle(roundId?: number): Promise<void> {
    const buckets = roundId === undefined ? [...this.tasks.values()] : [this.tasks.get(roundId) ?? new Set<TrackedTask>()];
    const promises = buckets.flatMap((bucket) => [...bucket].map((task) => task.promise));
    await Promise.all(promises);
  }
}
