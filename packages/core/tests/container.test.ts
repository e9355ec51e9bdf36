import { afterEach, describe, expect, test, vi } from "vitest";
import {
  createStateContainer,
  custom,
  OperationFailureError,
  SchemaError,
  ScopeClosedError,
  sortByPublishedAtDesc,
  StateContainer,
  TaskScopeError,
  VirtualClock,
  type ContainerOption,
  type NewsItem,
  type UserData,
} from "../src";
import { fakes, newsItem, secondsAgo, spyLogger } from "./utils";

const aName = "Some name";
const date1 = newsItem(10);
const date2 = newsItem(20);
const date3 = newsItem(30);
const someNews = [date3, date1, date2];

describe("state container", () => {
  let container: StateContainer | undefined;

  afterEach(async () => {
    await container?.stop();
    container = undefined;
  });

  function setup(
    overrides: (clock: VirtualClock) => Partial<ContainerOption> = () => ({})
  ) {
    const clock = new VirtualClock();
    container = createStateContainer({
      userRepository: fakes.user(clock, aName),
      newsRepository: fakes.news(clock, someNews),
      clock,
      ...overrides(clock),
    });
    return { clock, container };
  }

  test("shows user name and sorted news", async () => {
    const { clock, container } = setup();

    container.start();
    await clock.advanceUntilIdle();

    expect(container.userName.read()).toBe(aName);
    expect(container.newsList.read()).toEqual([date1, date2, date3]);
  });

  test("shows progress while news is loading", async () => {
    const { clock, container } = setup();
    expect(container.progressVisible.read()).toBeUndefined();

    container.start();
    expect(container.progressVisible.read()).toBe(true);

    await clock.advanceTimeBy(200);
    expect(container.progressVisible.read()).toBe(false);
    expect(container.userName.read()).toBeUndefined();
  });

  test("fetches user and news concurrently", async () => {
    const { clock, container } = setup();

    container.start();
    await clock.advanceUntilIdle();

    expect(clock.currentTime).toBe(300);
  });

  test("brackets the news write with the progress flag", async () => {
    const { clock, container } = setup();
    const events: string[] = [];

    container.progressVisible.watch((visible) => events.push(`progress:${visible}`));
    container.newsList.watch((items) => events.push(`news:${items.length}`));
    container.userName.watch((name) => events.push(`user:${name}`));

    container.start();
    await clock.advanceUntilIdle();

    expect(events).toEqual([
      "progress:true",
      "news:3",
      "progress:false",
      `user:${aName}`,
    ]);
  });

  test("keeps news with equal timestamps in their original order", async () => {
    const first = { publishedAt: secondsAgo(20), title: "first" };
    const second = { publishedAt: secondsAgo(20), title: "second" };
    const newest = { publishedAt: secondsAgo(5), title: "newest" };
    const items: NewsItem[] = [first, second, newest];
    const { clock, container } = setup((clock) => ({
      newsRepository: fakes.news(clock, items),
    }));

    container.start();
    await clock.advanceUntilIdle();

    expect(container.newsList.read()).toEqual([newest, first, second]);
  });

  test("cancels a slow fetch on stop and never publishes it", async () => {
    const { clock, container } = setup((clock) => ({
      newsRepository: fakes.news(clock, someNews, 1000),
    }));
    const newsWrites = vi.fn();
    container.newsList.watch(newsWrites);

    const tasks = container.start();
    await clock.advanceTimeBy(300);
    expect(container.userName.read()).toBe(aName);

    await container.stop();

    expect(tasks.user.state).toBe("completed");
    expect(tasks.news.state).toBe("cancelled");
    expect(container.scope.state).toBe("terminated");
    expect(container.scope.children).toEqual([]);
    expect(clock.pendingTimers).toBe(0);

    await clock.advanceTimeBy(2000);

    expect(newsWrites).not.toHaveBeenCalled();
    expect(container.newsList.read()).toBeUndefined();
    expect(container.progressVisible.read()).toBe(true);
    expect(await tasks.news.join()).toEqual({ state: "cancelled" });
  });

  test("updates news when the user fetch fails", async () => {
    const { clock, container } = setup((clock) => ({
      userRepository: fakes.failingUser(clock, "user service down"),
    }));

    const tasks = container.start();
    await clock.advanceUntilIdle();

    expect(container.userName.read()).toBeUndefined();
    expect(container.newsList.read()).toEqual([date1, date2, date3]);
    expect(container.progressVisible.read()).toBe(false);
    expect(tasks.user.state).toBe("failed");
    expect(tasks.news.state).toBe("completed");
  });

  test("updates the user name and clears progress when the news fetch fails", async () => {
    const { clock, container } = setup((clock) => ({
      newsRepository: fakes.failingNews(clock, "news service down"),
    }));

    const tasks = container.start();
    await clock.advanceUntilIdle();

    expect(container.userName.read()).toBe(aName);
    expect(container.newsList.read()).toBeUndefined();
    expect(container.progressVisible.read()).toBe(false);

    const outcome = await tasks.news.join();
    expect(outcome.state).toBe("failed");
    if (outcome.state === "failed") {
      expect(outcome.error).toBeInstanceOf(OperationFailureError);
      expect(outcome.error.message).toBe(
        "Task 'news' in scope 'state-container' failed: news service down"
      );
    }
  });

  test("launches a second pair of tasks when started twice", async () => {
    const { clock, container } = setup();
    const names = vi.fn();
    container.userName.watch(names);

    container.start();
    container.start();
    expect(container.scope.children).toHaveLength(4);

    await clock.advanceUntilIdle();

    expect(names).toHaveBeenCalledTimes(2);
    expect(names).toHaveBeenNthCalledWith(2, aName, aName);
    expect(container.scope.children).toHaveLength(0);
  });

  test("refuses to start once stopped", async () => {
    const { container } = setup();

    await container.stop();

    expect(() => container.start()).toThrow(ScopeClosedError);
  });

  test("treats a user record rejected by the schema as a failure", async () => {
    const logger = spyLogger();
    const nonEmptyName = custom(
      (value): value is UserData =>
        typeof value === "object" &&
        value !== null &&
        "name" in value &&
        typeof value.name === "string" &&
        value.name.length > 0,
      "name must not be empty"
    );
    const { clock, container } = setup((clock) => ({
      userRepository: fakes.user(clock, ""),
      logger,
      schemas: { user: nonEmptyName },
    }));

    const tasks = container.start();
    await clock.advanceUntilIdle();

    expect(container.userName.read()).toBeUndefined();
    const outcome = await tasks.user.join();
    expect(outcome.state).toBe("failed");
    if (outcome.state === "failed") {
      expect(outcome.error.cause).toBeInstanceOf(SchemaError);
    }
    expect(logger.warn).toHaveBeenCalledWith(
      "Task 'user' in scope 'state-container' failed: name must not be empty",
      expect.objectContaining({ scope: "state-container" })
    );
  });

  test("rejects news items without a valid date", async () => {
    const { clock, container } = setup((clock) => ({
      newsRepository: fakes.news(clock, [{ publishedAt: new Date(Number.NaN) }]),
    }));

    const tasks = container.start();
    await clock.advanceUntilIdle();

    expect(tasks.news.state).toBe("failed");
    expect(container.newsList.read()).toBeUndefined();
    expect(container.progressVisible.read()).toBe(false);
  });

  test("rejects a news repository without a getNews method", () => {
    const clock = new VirtualClock();
    const newsRepository = fakes.news(clock, someNews);
    Reflect.deleteProperty(newsRepository, "getNews");

    let thrown: unknown;
    try {
      createStateContainer({
        userRepository: fakes.user(clock, aName),
        newsRepository,
        clock,
      });
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(TaskScopeError);
    expect(thrown).toMatchObject({
      code: "C001",
      message:
        "Invalid option 'newsRepository': expected an object with a 'getNews' method",
    });
  });
});

describe("sortByPublishedAtDesc", () => {
  test("orders newest first without touching the input", () => {
    const input = [date2, date3, date1];

    expect(sortByPublishedAtDesc(input)).toEqual([date1, date2, date3]);
    expect(input).toEqual([date2, date3, date1]);
  });

  test("returns an empty list for no items", () => {
    expect(sortByPublishedAtDesc([])).toEqual([]);
  });
});
