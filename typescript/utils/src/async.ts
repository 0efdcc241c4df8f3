import { rootLogger } from './logging.js';

/**
 * Return a promise that resolves in ms milliseconds.
 * @param ms Time to wait
 */
export function sleep(ms: number): Promise<void> {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

/**
 * Executes a fetch request that fails after a timeout via an AbortController.
 * @param resource resource to fetch (e.g URL)
 * @param options fetch call options object
 * @param timeout timeout MS (default 10_000)
 * @returns fetch response
 */
export async function fetchWithTimeout(
  resource: string | URL,
  options?: RequestInit,
  timeout = 10_000,
) {
  const controller = new AbortController();
  const id = setTimeout(() => controller.abort(), timeout);
  try {
    return await fetch(resource, {
      ...options,
      signal: controller.signal,
    });
  } finally {
    clearTimeout(id);
  }
}

/**
 * Retries an async function if it raises an exception,
 *   using exponential backoff.
 * @param runner callback to run
 * @param attempts max number of attempts
 * @param baseRetryMs base delay between attempts
 * @returns runner return value
 */
export async function retryAsync<T>(
  runner: () => T | Promise<T>,
  attempts = 5,
  baseRetryMs = 50,
): Promise<T> {
  let saveError: unknown;
  for (let i = 0; i < Math.max(attempts, 1); i++) {
    try {
      return await runner();
    } catch (error) {
      saveError = error;
      if (i < attempts - 1) await sleep(baseRetryMs * 2 ** i);
    }
  }
  throw saveError;
}

/**
 * Run a callback repeatedly until it stops throwing.
 * @param runner callback to run
 * @param delayMs delay between attempts
 * @param maxAttempts maximum number of attempts
 * @returns runner return value
 */
export async function pollAsync<T>(
  runner: () => Promise<T>,
  delayMs = 500,
  maxAttempts: number | undefined = undefined,
): Promise<T> {
  let attempts = 0;
  let saveError: unknown;
  while (!maxAttempts || attempts < maxAttempts) {
    try {
      return await runner();
    } catch (error) {
      rootLogger.debug({ error }, 'Error in pollAsync');
      saveError = error;
      attempts += 1;
      if (!maxAttempts || attempts < maxAttempts) await sleep(delayMs);
    }
  }
  throw saveError;
}
