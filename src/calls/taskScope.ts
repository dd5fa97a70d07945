// src/calls/taskScope.ts
// Structured concurrency for the pumps of one session: sibling tasks share an
// AbortSignal; the first failure (or a task marked terminal finishing) cancels the rest,
// and join() resolves only after every task has returned.

import { isAbortError } from '../errors';
import { log } from '../log';

export type ScopeOutcome = {
  reason: string;
  task?: string;
  error?: unknown;
};

export type TaskOptions = {
  /** A normal return from this task ends the whole scope. */
  terminal?: boolean;
};

export function abortError(message = 'aborted'): Error {
  const error = new Error(message);
  error.name = 'AbortError';
  return error;
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortError());
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(abortError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/** Iterates `source` until it ends or `signal` aborts; abort closes the iterator. */
export async function* untilAborted<T>(source: AsyncIterable<T>, signal: AbortSignal): AsyncGenerator<T> {
  const iterator = source[Symbol.asyncIterator]();
  let onAbort: (() => void) | undefined;
  const aborted = new Promise<never>((_, reject) => {
    onAbort = () => reject(abortError());
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
  });
  // Keep the race promise from surfacing as an unhandled rejection.
  aborted.catch(() => undefined);

  try {
    while (true) {
      const result = await Promise.race([iterator.next(), aborted]);
      if (result.done) {
        return;
      }
      yield result.value;
    }
  } finally {
    if (onAbort) {
      signal.removeEventListener('abort', onAbort);
    }
    // Not awaited: a generator parked on its own source queues return() until that source
    // yields, which for an idle socket is never.
    if (signal.aborted && iterator.return) {
      iterator.return().catch((error: unknown) => {
        log.debug({ err: error }, 'iterator return failed after abort');
      });
    }
  }
}

export class TaskScope {
  private readonly controller = new AbortController();
  private readonly tasks: Promise<void>[] = [];
  private readonly logContext?: Record<string, unknown>;
  private outcome?: ScopeOutcome;

  constructor(logContext?: Record<string, unknown>) {
    this.logContext = logContext;
  }

  public get signal(): AbortSignal {
    return this.controller.signal;
  }

  public spawn(name: string, run: (signal: AbortSignal) => Promise<void>, options: TaskOptions = {}): void {
    const task = (async () => {
      try {
        await run(this.controller.signal);
        if (options.terminal) {
          this.settle({ reason: `${name}_completed`, task: name });
        }
      } catch (error) {
        if (this.controller.signal.aborted) {
          if (!isAbortError(error)) {
            log.debug(
              { event: 'task_error_after_cancel', task: name, err: error, ...(this.logContext ?? {}) },
              'task failed after scope cancellation',
            );
          }
          return;
        }
        this.settle({ reason: `${name}_failed`, task: name, error });
      }
    })();
    this.tasks.push(task);
  }

  public abort(reason: string): void {
    this.settle({ reason });
  }

  public onCancel(listener: (outcome: ScopeOutcome) => void): void {
    const fire = (): void => {
      listener(this.outcome ?? { reason: 'aborted' });
    };
    if (this.controller.signal.aborted) {
      fire();
      return;
    }
    this.controller.signal.addEventListener('abort', fire, { once: true });
  }

  public async join(): Promise<ScopeOutcome> {
    // Tasks are added synchronously by the owner before join(); new ones are not expected.
    await Promise.all(this.tasks);
    if (!this.outcome) {
      this.settle({ reason: 'completed' });
    }
    return this.outcome ?? { reason: 'completed' };
  }

  private settle(outcome: ScopeOutcome): void {
    if (this.outcome) {
      return;
    }
    this.outcome = outcome;
    this.controller.abort();
  }
}
