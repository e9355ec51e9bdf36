import { vi } from "vitest";
import type {
  Core,
  Logger,
  NewsItem,
  NewsRepository,
  UserRepository,
} from "../src";

export const NOW = Date.UTC(2024, 0, 1, 12, 0, 0);

export function secondsAgo(seconds: number): Date {
  return new Date(NOW - seconds * 1000);
}

export function newsItem(secondsBefore: number): NewsItem {
  return { publishedAt: secondsAgo(secondsBefore) };
}

export const fakes = {
  user(clock: Core.Clock, name: string, delay = 300): UserRepository {
    return {
      getUser: async (signal) => {
        await clock.sleep(delay, signal);
        return { name };
      },
    };
  },

  news(clock: Core.Clock, items: NewsItem[], delay = 200): NewsRepository {
    return {
      getNews: async (signal) => {
        await clock.sleep(delay, signal);
        return items;
      },
    };
  },

  failingUser(clock: Core.Clock, message: string, delay = 100): UserRepository {
    return {
      getUser: async (signal) => {
        await clock.sleep(delay, signal);
        throw new Error(message);
      },
    };
  },

  failingNews(clock: Core.Clock, message: string, delay = 100): NewsRepository {
    return {
      getNews: async (signal) => {
        await clock.sleep(delay, signal);
        throw new Error(message);
      },
    };
  },
};

export function spyLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  } satisfies Logger;
}
