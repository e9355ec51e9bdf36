import {
  type Core,
  type ErrorContext,
  OperationFailureError,
  ScopeClosedError,
  TaskCancelledError,
  TaskScopeError,
} from "./types";

export const codes = {
  SCOPE_CLOSED: "S001",
  CALLBACK_ON_CLOSED_SCOPE: "S002",
  EXTENSION_ON_CLOSED_SCOPE: "S003",

  OPERATION_FAILED: "T001",
  TASK_CANCELLED: "T002",

  ASYNC_VALIDATION_NOT_SUPPORTED: "V001",
  INVALID_OPTION: "C001",
} as const;

export type Code = (typeof codes)[keyof typeof codes];

const messages: Record<Code, string> = {
  [codes.SCOPE_CLOSED]:
    "Cannot launch task '{taskName}' on scope '{scopeName}': scope is {scopeState}",
  [codes.CALLBACK_ON_CLOSED_SCOPE]:
    "Cannot register error callback on scope '{scopeName}': scope is {scopeState}",
  [codes.EXTENSION_ON_CLOSED_SCOPE]:
    "Cannot register extension '{extensionName}' on scope '{scopeName}': scope is {scopeState}",

  [codes.OPERATION_FAILED]:
    "Task '{taskName}' in scope '{scopeName}' failed: {cause}",
  [codes.TASK_CANCELLED]:
    "Task '{taskName}' in scope '{scopeName}' was cancelled",

  [codes.ASYNC_VALIDATION_NOT_SUPPORTED]:
    "Async validation is not currently supported",
  [codes.INVALID_OPTION]: "Invalid option '{option}': {reason}",
};

export function formatMessage(
  code: Code,
  context: Record<string, unknown> = {}
): string {
  let message = messages[code];

  for (const [key, value] of Object.entries(context)) {
    const placeholder = `{${key}}`;
    message = message.replaceAll(placeholder, String(value));
  }

  return message;
}

export function describeTask(task: { id: number; name: string | undefined }): string {
  return task.name ?? `task-${task.id}`;
}

export function describeCause(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  try {
    return String(error);
  } catch {
    return Object.prototype.toString.call(error);
  }
}

function errorContext(
  scopeName: string,
  task: { id: number; name: string | undefined } | undefined,
  additionalInfo?: Record<string, unknown>
): ErrorContext {
  return {
    scopeName,
    taskId: task?.id,
    taskName: task?.name,
    timestamp: Date.now(),
    additionalInfo,
  };
}

export function createScopeClosedError(
  code: Code,
  scopeName: string,
  scopeState: Core.ScopeState,
  additionalContext: Record<string, unknown> = {}
): ScopeClosedError {
  const message = formatMessage(code, {
    scopeName,
    scopeState,
    ...additionalContext,
  });

  return new ScopeClosedError(
    message,
    errorContext(scopeName, undefined, additionalContext),
    code,
    scopeState
  );
}

export function createOperationError(
  scopeName: string,
  task: { id: number; name: string | undefined },
  originalError: unknown
): OperationFailureError {
  const message = formatMessage(codes.OPERATION_FAILED, {
    scopeName,
    taskName: describeTask(task),
    cause: describeCause(originalError),
  });

  return new OperationFailureError(
    message,
    errorContext(scopeName, task),
    codes.OPERATION_FAILED,
    { cause: originalError }
  );
}

export function createCancelledError(
  scopeName: string,
  task: { id: number; name: string | undefined }
): TaskCancelledError {
  const message = formatMessage(codes.TASK_CANCELLED, {
    scopeName,
    taskName: describeTask(task),
  });

  return new TaskCancelledError(
    message,
    errorContext(scopeName, task),
    codes.TASK_CANCELLED
  );
}

export function createInvalidOptionError(
  scopeName: string,
  option: string,
  reason: string
): TaskScopeError {
  return new TaskScopeError(
    formatMessage(codes.INVALID_OPTION, { option, reason }),
    errorContext(scopeName, undefined, { option }),
    codes.INVALID_OPTION
  );
}
