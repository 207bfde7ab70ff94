/**
 * Small helpers shared across the poster.
 */

export type InterruptibleSleep = {
  promise: Promise<void>;
  wake: () => void;
};

/**
 * Sleep with early wakeup capability.
 * Returns a promise that resolves after the timeout, and a function to resolve early.
 */
export function interruptibleSleep(ms: number): InterruptibleSleep {
  let wakeFn: (() => void) | null = null;
  const promise = new Promise<void>((resolve) => {
    const t = setTimeout(() => {
      wakeFn = null;
      resolve();
    }, Math.max(0, ms));
    wakeFn = () => {
      clearTimeout(t);
      wakeFn = null;
      resolve();
    };
  });
  return {
    promise,
    wake: () => wakeFn?.()
  };
}

/**
 * `code` of a Node.js system error (ENOENT, ECONNRESET, ...), if the value carries one.
 */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}
