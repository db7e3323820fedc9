import { TimeoutError } from "@pitchcheck/shared";

/**
 * Race a promise against a timeout.
 *
 * NOTE: This does NOT cancel the underlying promise unless it is wired to an AbortSignal.
 * The HTTP collaborators also pass `AbortSignal.timeout()` to fetch.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return promise;
  }

  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    if (timeoutId) clearTimeout(timeoutId);
  }
}
