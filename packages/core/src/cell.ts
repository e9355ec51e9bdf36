import type { Core } from "./types";
import { type Logger, silentLogger } from "./logger";

class CellImpl<T> implements Core.Cell<T> {
  private value: T | undefined = undefined;
  private readonly listeners = new Set<Core.CellListener<T>>();

  constructor(
    private readonly label: string,
    private readonly logger: Logger
  ) {}

  read(): T | undefined {
    return this.value;
  }

  write(value: T): void {
    const previous = this.value;
    this.value = value;

    for (const listener of [...this.listeners]) {
      try {
        listener(value, previous);
      } catch (error) {
        this.logger.error(`cell '${this.label}' listener threw`, error);
      }
    }
  }

  watch(listener: Core.CellListener<T>): Core.Cleanup {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}

/**
 * Creates an empty single-slot cell. Writes are synchronous and visible to
 * every subsequent `read()`; `watch` listeners run after each write.
 */
export function cell<T>(
  label = "cell",
  options: { logger?: Logger } = {}
): Core.Cell<T> {
  return new CellImpl<T>(label, options.logger ?? silentLogger);
}

export function readonly<T>(source: Core.ReadonlyCell<T>): Core.ReadonlyCell<T> {
  return {
    read: () => source.read(),
    watch: (listener) => source.watch(listener),
  };
}
