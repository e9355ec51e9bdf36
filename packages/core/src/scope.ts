import {
  type Core,
  type Extension,
  type OperationFailureError,
} from "./types";
import { Promised } from "./promises";
import { type Logger, silentLogger } from "./logger";
import { systemClock } from "./clock";
import * as errors from "./error-codes";

let taskSequence = 0;
let scopeSequence = 0;

interface Deferred<T> {
  readonly promise: Promise<T>;
  resolve(value: T): void;
}

function deferred<T>(): Deferred<T> {
  let settle: (value: T) => void = () => {};
  const promise = new Promise<T>((resolve) => {
    settle = resolve;
  });

  return {
    promise,
    resolve(value) {
      settle(value);
    },
  };
}

class TaskImpl<T> implements Core.Task<T> {
  public readonly id: number = ++taskSequence;
  private currentState: Core.TaskState = "running";
  private readonly outcome: Deferred<Core.TaskOutcome<T>> = deferred();

  constructor(
    public readonly scope: Core.Scope,
    public readonly name: string | undefined
  ) {}

  get state(): Core.TaskState {
    return this.currentState;
  }

  join(): Promised<Core.TaskOutcome<T>> {
    return Promised.create(this.outcome.promise);
  }

  "~settle"(outcome: Core.TaskOutcome<T>): boolean {
    if (this.currentState !== "running") {
      return false;
    }
    this.currentState = outcome.state;
    this.outcome.resolve(outcome);
    return true;
  }
}

class TaskScopeImpl implements Core.Scope {
  public readonly name: string;
  public readonly clock: Core.Clock;
  private readonly logger: Logger;
  private readonly controller = new AbortController();
  private readonly tasks = new Set<TaskImpl<unknown>>();
  private readonly extensions: Extension.Extension[] = [];
  private readonly errorCallbacks = new Set<Core.ErrorCallback>();
  private currentState: Core.ScopeState = "active";
  private joining: Promise<void> | undefined;

  constructor(option: Core.ScopeOption = {}) {
    this.name = option.name ?? `scope-${++scopeSequence}`;
    this.clock = option.clock ?? systemClock;
    this.logger = option.logger ?? silentLogger;

    for (const extension of option.extensions ?? []) {
      this.useExtension(extension);
    }
  }

  get state(): Core.ScopeState {
    return this.currentState;
  }

  get children(): readonly Core.UTask[] {
    return [...this.tasks];
  }

  launch<T>(body: Core.TaskBody<T>, options: Core.LaunchOptions = {}): Core.Task<T> {
    if (this.currentState !== "active") {
      throw errors.createScopeClosedError(
        errors.codes.SCOPE_CLOSED,
        this.name,
        this.currentState,
        { taskName: options.name ?? "anonymous" }
      );
    }

    const task = new TaskImpl<T>(this, options.name);
    this.tasks.add(task);
    this.log("debug", `launched ${errors.describeTask(task)}`, {
      scope: this.name,
      taskId: task.id,
    });

    const context = this.createContext(task);
    const run = Promised.try(() =>
      this.execute(task, async (): Promise<T> => body(context))
    );

    void run.then(
      (value) => this.complete(task, value),
      (error: unknown) => this.fail(task, error)
    );

    return task;
  }

  cancelAndJoin(): Promised<void> {
    if (!this.joining) {
      this.currentState = "cancelling";
      this.log("info", `cancelling scope '${this.name}'`, {
        running: this.tasks.size,
      });
      this.controller.abort();
      this.joining = this.join();
    }

    return Promised.create(this.joining);
  }

  onError(callback: Core.ErrorCallback): Core.Cleanup {
    if (this.currentState !== "active") {
      throw errors.createScopeClosedError(
        errors.codes.CALLBACK_ON_CLOSED_SCOPE,
        this.name,
        this.currentState
      );
    }

    this.errorCallbacks.add(callback);
    return () => {
      this.errorCallbacks.delete(callback);
    };
  }

  useExtension(extension: Extension.Extension): Core.Cleanup {
    if (this.currentState !== "active") {
      throw errors.createScopeClosedError(
        errors.codes.EXTENSION_ON_CLOSED_SCOPE,
        this.name,
        this.currentState,
        { extensionName: extension.name }
      );
    }

    this.extensions.push(extension);
    extension.init?.(this);

    return () => {
      const index = this.extensions.indexOf(extension);
      if (index !== -1) {
        this.extensions.splice(index, 1);
      }
    };
  }

  private createContext(task: TaskImpl<unknown>): Core.TaskContext {
    const signal = this.controller.signal;

    return {
      signal,
      clock: this.clock,
      await: (promise) => this.awaitCancellable(task, promise),
      ensureActive: () => {
        if (signal.aborted) {
          throw errors.createCancelledError(this.name, task);
        }
      },
    };
  }

  private awaitCancellable<T>(
    task: TaskImpl<unknown>,
    promise: PromiseLike<T>
  ): Promise<T> {
    const signal = this.controller.signal;
    if (signal.aborted) {
      return Promise.reject(errors.createCancelledError(this.name, task));
    }

    return new Promise<T>((resolve, reject) => {
      const onAbort = () => {
        reject(errors.createCancelledError(this.name, task));
      };
      signal.addEventListener("abort", onAbort, { once: true });

      promise.then(
        (value) => {
          signal.removeEventListener("abort", onAbort);
          resolve(value);
        },
        (error: unknown) => {
          signal.removeEventListener("abort", onAbort);
          reject(error);
        }
      );
    }).then((value) => {
      // resuming after teardown began behaves like resuming into a cancellation
      if (signal.aborted) {
        throw errors.createCancelledError(this.name, task);
      }
      return value;
    });
  }

  private execute<T>(task: TaskImpl<unknown>, next: () => Promise<T>): Promise<T> {
    const operation: Extension.Operation = { kind: "task", task, scope: this };

    let run = next;
    for (const extension of [...this.extensions].reverse()) {
      const inner = run;
      run = () =>
        extension.wrap ? extension.wrap(inner, operation) : inner();
    }

    return run();
  }

  private complete<T>(task: TaskImpl<T>, value: T): void {
    this.tasks.delete(task);
    if (task["~settle"]({ state: "completed", value })) {
      this.log("debug", `completed ${errors.describeTask(task)}`, {
        scope: this.name,
        taskId: task.id,
      });
    }
  }

  private fail(task: TaskImpl<unknown>, error: unknown): void {
    this.tasks.delete(task);

    if (this.controller.signal.aborted) {
      if (task["~settle"]({ state: "cancelled" })) {
        this.log("debug", `cancelled ${errors.describeTask(task)}`, {
          scope: this.name,
          taskId: task.id,
        });
      }
      return;
    }

    const failure = errors.createOperationError(this.name, task, error);
    task["~settle"]({ state: "failed", error: failure });

    this.log("warn", failure.message, { scope: this.name, taskId: task.id });
    this.notifyError(failure, task);
  }

  private log(level: keyof Logger, message: unknown, ...args: unknown[]): void {
    try {
      this.logger[level](message, ...args);
    } catch {
      // task state is already final here
      return;
    }
  }

  private notifyError(failure: OperationFailureError, task: Core.UTask): void {
    for (const extension of this.extensions) {
      try {
        extension.onError?.(failure, task);
      } catch (error) {
        this.log("error", `extension '${extension.name}' onError threw`, error);
      }
    }

    for (const callback of [...this.errorCallbacks]) {
      try {
        callback(failure, task);
      } catch (error) {
        this.log("error", "error callback threw", error);
      }
    }
  }

  private async join(): Promise<void> {
    await Promise.all([...this.tasks].map((task) => task.join().toPromise()));

    for (const extension of this.extensions) {
      try {
        await extension.dispose?.(this);
      } catch (error) {
        this.log("error", `extension '${extension.name}' dispose threw`, error);
      }
    }

    this.errorCallbacks.clear();
    this.currentState = "terminated";
    this.log("info", `scope '${this.name}' terminated`);
  }
}

export type ScopeOption = Core.ScopeOption;

export function createTaskScope(option?: ScopeOption): Core.Scope {
  return new TaskScopeImpl(option);
}
