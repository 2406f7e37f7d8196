export type RaceOutcome<T> = { kind: "completed"; value: T } | { kind: "timed_out" };

/**
 * Waits for `task` or `timeoutMs`, whichever comes first. Losing the race
 * leaves the task running; a rejection before the timer fires propagates.
 */
export function raceWithTimeout<T>(task: Promise<T>, timeoutMs: number): Promise<RaceOutcome<T>> {
  return new Promise<RaceOutcome<T>>((resolve, reject) => {
    const timer = setTimeout(() => resolve({ kind: "timed_out" }), timeoutMs);
    task.then(
      (value) => {
        clearTimeout(timer);
        resolve({ kind: "completed", value });
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}
