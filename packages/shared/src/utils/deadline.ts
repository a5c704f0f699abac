import { DeadlineExceededError } from "../errors/index.js";

/**
 * Race a promise against a timer. The timer is cleared as soon as either side settles.
 *
 * A non-positive timeout disables the deadline.
 */
export async function withDeadline<T>(promise: Promise<T>, timeoutMs: number, operation: string): Promise<T> {
  if (timeoutMs <= 0) {
    return promise;
  }

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new DeadlineExceededError(operation, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
