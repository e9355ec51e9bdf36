import type { StandardSchemaV1 } from "@standard-schema/spec";
import { SchemaError, type NewsItem, type UserData } from "./types";
import { codes, formatMessage } from "./error-codes";

export function validate<Output>(
  schema: StandardSchemaV1<unknown, Output>,
  data: unknown
): Output {
  const result = schema["~standard"].validate(data);

  if ("then" in result) {
    throw new Error(formatMessage(codes.ASYNC_VALIDATION_NOT_SUPPORTED));
  }

  if (result.issues) {
    throw new SchemaError(result.issues);
  }
  return result.value;
}

export function custom<T>(
  check: (value: unknown) => value is T,
  message: string
): StandardSchemaV1<unknown, T> {
  return {
    "~standard": {
      vendor: "taskscope",
      version: 1,
      validate: (value) => {
        if (check(value)) {
          return { value };
        }
        return { issues: [{ message }] };
      },
    },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export const userData: StandardSchemaV1<unknown, UserData> = custom(
  (value): value is UserData =>
    isRecord(value) && typeof value["name"] === "string",
  "user data must carry a string 'name'"
);

export const newsItem: StandardSchemaV1<unknown, NewsItem> = custom(
  (value): value is NewsItem =>
    isRecord(value) &&
    value["publishedAt"] instanceof Date &&
    !Number.isNaN(value["publishedAt"].getTime()),
  "news item must carry a valid 'publishedAt' date"
);
