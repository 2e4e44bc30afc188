// Interview Session Client - Cancellable scheduled tasks
//
// Every timer in the client is owned by exactly one TaskScheduler. A task is
// invalidated (cancelled flag set) before its handle is cleared, so a callback
// that was already queued by the runtime still does nothing after cancel().

export interface ScheduledTask {
  readonly name: string;
  readonly active: boolean;
  cancel(): void;
}

class TimerTask implements ScheduledTask {
  readonly name: string;
  private readonly repeating: boolean;
  private readonly onDone: (task: TimerTask) => void;
  private cancelled = false;
  private clear: (() => void) | null = null;

  constructor(name: string, repeating: boolean, onDone: (task: TimerTask) => void) {
    this.name = name;
    this.repeating = repeating;
    this.onDone = onDone;
  }

  get active(): boolean {
    return !this.cancelled && this.clear !== null;
  }

  start(delayMs: number, callback: () => void): void {
    const run = () => {
      if (this.cancelled) return;
      if (!this.repeating) {
        this.clear = null;
        this.onDone(this);
      }
      callback();
    };
    if (this.repeating) {
      const handle = setInterval(run, delayMs);
      this.clear = () => clearInterval(handle);
    } else {
      const handle = setTimeout(run, delayMs);
      this.clear = () => clearTimeout(handle);
    }
  }

  cancel(): void {
    if (this.cancelled) return;
    this.cancelled = true;
    this.clear?.();
    this.clear = null;
    this.onDone(this);
  }
}

export class TaskScheduler {
  private readonly tasks = new Set<TimerTask>();

  /** Runs `callback` once after `delayMs`. */
  schedule(name: string, delayMs: number, callback: () => void): ScheduledTask {
    return this.start(name, false, delayMs, callback);
  }

  /** Runs `callback` every `intervalMs` until cancelled. */
  every(name: string, intervalMs: number, callback: () => void): ScheduledTask {
    return this.start(name, true, intervalMs, callback);
  }

  /** Resolves after `delayMs` unless the scheduler is cancelled first, in which case it never settles. */
  sleep(name: string, delayMs: number): Promise<void> {
    return new Promise((resolve) => {
      this.schedule(name, delayMs, resolve);
    });
  }

  cancelAll(): void {
    for (const task of [...this.tasks]) {
      task.cancel();
    }
  }

  get activeCount(): number {
    return this.tasks.size;
  }

  activeNames(): string[] {
    return [...this.tasks].map((task) => task.name);
  }

  private start(name: string, repeating: boolean, delayMs: number, callback: () => void): ScheduledTask {
    const task = new TimerTask(name, repeating, (done) => {
      this.tasks.delete(done);
    });
    this.tasks.add(task);
    task.start(delayMs, callback);
    return task;
  }
}
