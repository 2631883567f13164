// Typed deferred utility, kept out of the type barrel (src/types.ts) so it stays runtime code.
// Lets tests hold a collaborator call mid-flight and release it on cue.

import type { Deferred } from "../types.js";

export function createDeferred<T>(): Deferred<T> {
  let resolve!: (value: T) => void;
  let reject!: (reason: unknown) => void;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
