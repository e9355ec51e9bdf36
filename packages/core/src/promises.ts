export class Promised<T> implements PromiseLike<T> {
  private promise: Promise<T>;

  constructor(promise: Promise<T> | Promised<T>) {
    this.promise = promise instanceof Promised ? promise.promise : promise;
  }

  map<U>(fn: (value: T) => U | Promise<U>): Promised<U> {
    return new Promised(this.promise.then(fn));
  }

  then<TResult1 = T, TResult2 = never>(
    onfulfilled?: ((value: T) => TResult1 | PromiseLike<TResult1>) | null | undefined,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null | undefined
  ): Promised<TResult1 | TResult2> {
    return new Promised(this.promise.then(onfulfilled, onrejected));
  }

  toPromise(): Promise<T> {
    return this.promise;
  }

  static create<T>(promise: Promise<T>): Promised<T> {
    return new Promised(promise);
  }

  static try<T>(fn: () => T | Promise<T>): Promised<T> {
    return new Promised(
      new Promise<T>((resolve, reject) => {
        try {
          resolve(fn());
        } catch (error) {
          reject(error);
        }
      })
    );
  }
}
