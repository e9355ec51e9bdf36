export * from "./types";

export { cell, readonly } from "./cell";
export { createTaskScope, type ScopeOption } from "./scope";
export {
  createStateContainer,
  sortByPublishedAtDesc,
  StateContainer,
  type ContainerOption,
  type StartedTasks,
} from "./container";

export { systemClock, VirtualClock, flushPromises } from "./clock";
export { Promised } from "./promises";
export { type Logger, silentLogger, consoleLogger } from "./logger";

export { validate, custom } from "./ssch";
export * as schemas from "./ssch";
export * as errors from "./error-codes";
