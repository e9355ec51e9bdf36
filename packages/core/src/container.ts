import type { StandardSchemaV1 } from "@standard-schema/spec";
import {
  type Core,
  type Extension,
  type NewsItem,
  type NewsRepository,
  type UserData,
  type UserRepository,
} from "./types";
import type { Promised } from "./promises";
import { type Logger, silentLogger } from "./logger";
import { cell, readonly } from "./cell";
import { createTaskScope } from "./scope";
import { createInvalidOptionError } from "./error-codes";
import * as schemas from "./ssch";

export interface ContainerOption {
  userRepository: UserRepository;
  newsRepository: NewsRepository;
  name?: string;
  clock?: Core.Clock;
  logger?: Logger;
  extensions?: Extension.Extension[];
  schemas?: {
    user?: StandardSchemaV1<unknown, UserData>;
    news?: StandardSchemaV1<unknown, NewsItem>;
  };
}

export interface StartedTasks {
  user: Core.Task<void>;
  news: Core.Task<void>;
}

export function sortByPublishedAtDesc(items: readonly NewsItem[]): NewsItem[] {
  return [...items].sort(
    (a, b) => b.publishedAt.getTime() - a.publishedAt.getTime()
  );
}

function assertRepository(
  name: string,
  option: string,
  repository: object | undefined,
  method: string
): void {
  if (
    repository === undefined ||
    !(method in repository) ||
    typeof Reflect.get(repository, method) !== "function"
  ) {
    throw createInvalidOptionError(
      name,
      option,
      `expected an object with a '${method}' method`
    );
  }
}

/**
 * Owns one task scope and the three cells it publishes. `start()` launches the
 * user and news fetches side by side; `stop()` cancels both and resolves once
 * neither can write again.
 *
 * The progress flag is cleared once the news fetch settles, whether it
 * succeeded or failed. A cancelled fetch leaves it untouched.
 */
export class StateContainer {
  public readonly userName: Core.ReadonlyCell<string>;
  public readonly newsList: Core.ReadonlyCell<readonly NewsItem[]>;
  public readonly progressVisible: Core.ReadonlyCell<boolean>;
  public readonly scope: Core.Scope;

  private readonly userNameCell: Core.Cell<string>;
  private readonly newsListCell: Core.Cell<readonly NewsItem[]>;
  private readonly progressVisibleCell: Core.Cell<boolean>;
  private readonly userRepository: UserRepository;
  private readonly newsRepository: NewsRepository;
  private readonly userSchema: StandardSchemaV1<unknown, UserData>;
  private readonly newsSchema: StandardSchemaV1<unknown, NewsItem>;
  private readonly logger: Logger;

  constructor(option: ContainerOption) {
    const name = option.name ?? "state-container";
    assertRepository(name, "userRepository", option.userRepository, "getUser");
    assertRepository(name, "newsRepository", option.newsRepository, "getNews");

    this.userRepository = option.userRepository;
    this.newsRepository = option.newsRepository;
    this.userSchema = option.schemas?.user ?? schemas.userData;
    this.newsSchema = option.schemas?.news ?? schemas.newsItem;
    this.logger = option.logger ?? silentLogger;

    this.scope = createTaskScope({
      name,
      clock: option.clock,
      logger: this.logger,
      extensions: option.extensions,
    });

    const cellOption = { logger: this.logger };
    this.userNameCell = cell<string>("userName", cellOption);
    this.newsListCell = cell<readonly NewsItem[]>("newsList", cellOption);
    this.progressVisibleCell = cell<boolean>("progressVisible", cellOption);

    this.userName = readonly(this.userNameCell);
    this.newsList = readonly(this.newsListCell);
    this.progressVisible = readonly(this.progressVisibleCell);
  }

  start(): StartedTasks {
    const user = this.scope.launch(
      async ({ await: wait, signal }) => {
        const data = await wait(this.userRepository.getUser(signal));
        this.userNameCell.write(schemas.validate(this.userSchema, data).name);
      },
      { name: "user" }
    );

    const news = this.scope.launch(
      async ({ await: wait, signal }) => {
        this.progressVisibleCell.write(true);
        try {
          const items = await wait(this.newsRepository.getNews(signal));
          const validated = items.map((item) =>
            schemas.validate(this.newsSchema, item)
          );
          this.newsListCell.write(sortByPublishedAtDesc(validated));
        } finally {
          if (!signal.aborted) {
            this.progressVisibleCell.write(false);
          }
        }
      },
      { name: "news" }
    );

    this.logger.debug("container started", { scope: this.scope.name });
    return { user, news };
  }

  stop(): Promised<void> {
    return this.scope.cancelAndJoin();
  }
}

export function createStateContainer(option: ContainerOption): StateContainer {
  return new StateContainer(option);
}
