import type { StandardSchemaV1 } from "@standard-schema/spec";
import type { Promised } from "./promises";
import type { Logger } from "./logger";

export type { StandardSchemaV1 } from "@standard-schema/spec";

export class SchemaError extends Error {
  public readonly issues: ReadonlyArray<StandardSchemaV1.Issue>;

  constructor(issues: ReadonlyArray<StandardSchemaV1.Issue>) {
    super(issues[0]?.message ?? "Schema validation failed");
    this.name = "SchemaError";
    this.issues = issues;
  }
}

export interface ErrorContext {
  readonly scopeName: string;
  readonly taskId?: number;
  readonly taskName?: string;
  readonly timestamp: number;
  readonly additionalInfo?: Record<string, unknown>;
}

export class TaskScopeError extends Error {
  public readonly context: ErrorContext;
  public readonly code: string;

  constructor(
    message: string,
    context: ErrorContext,
    code: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "TaskScopeError";
    this.context = context;
    this.code = code;
  }
}

export class ScopeClosedError extends TaskScopeError {
  public readonly scopeState: Core.ScopeState;

  constructor(
    message: string,
    context: ErrorContext,
    code: string,
    scopeState: Core.ScopeState
  ) {
    super(message, context, code);
    this.name = "ScopeClosedError";
    this.scopeState = scopeState;
  }
}

export class OperationFailureError extends TaskScopeError {
  constructor(
    message: string,
    context: ErrorContext,
    code: string,
    options?: { cause?: unknown }
  ) {
    super(message, context, code, options);
    this.name = "OperationFailureError";
  }
}

export class TaskCancelledError extends TaskScopeError {
  constructor(message: string, context: ErrorContext, code: string) {
    super(message, context, code);
    this.name = "TaskCancelledError";
  }
}

export declare namespace Core {
  export type MaybePromise<T> = T | Promise<T>;
  export type Cleanup = () => void;

  export type CellListener<T> = (next: T, previous: T | undefined) => void;

  export interface ReadonlyCell<T> {
    read(): T | undefined;
    watch(listener: CellListener<T>): Cleanup;
  }

  export interface Cell<T> extends ReadonlyCell<T> {
    write(value: T): void;
  }

  export interface Clock {
    now(): number;
    sleep(ms: number, signal?: AbortSignal): Promise<void>;
  }

  export type TaskState = "running" | "completed" | "failed" | "cancelled";

  export type TaskOutcome<T> =
    | { state: "completed"; value: T }
    | { state: "failed"; error: OperationFailureError }
    | { state: "cancelled" };

  export interface TaskContext {
    readonly signal: AbortSignal;
    readonly clock: Clock;
    await<T>(promise: PromiseLike<T>): Promise<T>;
    ensureActive(): void;
  }

  export type TaskBody<T> = (context: TaskContext) => MaybePromise<T>;

  export interface LaunchOptions {
    name?: string;
  }

  export interface Task<T> {
    readonly id: number;
    readonly name: string | undefined;
    readonly state: TaskState;
    readonly scope: Scope;
    join(): Promised<TaskOutcome<T>>;
  }

  export type UTask = Task<unknown>;

  export type ScopeState = "active" | "cancelling" | "terminated";

  export type ErrorCallback = (error: OperationFailureError, task: UTask) => void;

  export interface Scope {
    readonly name: string;
    readonly state: ScopeState;
    readonly children: readonly UTask[];
    readonly clock: Clock;

    launch<T>(body: TaskBody<T>, options?: LaunchOptions): Task<T>;
    cancelAndJoin(): Promised<void>;

    onError(callback: ErrorCallback): Cleanup;
    useExtension(extension: Extension.Extension): Cleanup;
  }

  export interface ScopeOption {
    name?: string;
    clock?: Clock;
    logger?: Logger;
    extensions?: Extension.Extension[];
  }
}

export declare namespace Extension {
  export type Operation = {
    kind: "task";
    task: Core.UTask;
    scope: Core.Scope;
  };

  export interface Extension {
    name: string;

    init?(scope: Core.Scope): void;

    wrap?<T>(next: () => Promise<T>, operation: Operation): Promise<T>;

    onError?(error: OperationFailureError, task: Core.UTask): void;

    dispose?(scope: Core.Scope): void | Promise<void>;
  }
}

export interface UserData {
  name: string;
}

export interface NewsItem {
  publishedAt: Date;
}

export interface UserRepository {
  getUser(signal?: AbortSignal): Promise<UserData>;
}

export interface NewsRepository {
  getNews(signal?: AbortSignal): Promise<NewsItem[]>;
}
