import { setTimeout as delay } from 'timers/promises';
import { WEBSERVER_EXCEPTIONS, WebServerError } from '../errors';
import { createLogger } from '../logger';

const logger = createLogger(['verify', 'http']);

export type FetchFn = (url: string, init: { signal: AbortSignal }) => Promise<{ status: number }>;

export interface HttpPollOptions {
  readonly url: string;
  /** Give up once this much time has passed since the first attempt */
  readonly timeoutMs: number;
  /** Pause between attempts, also the per-request timeout */
  readonly intervalMs: number;
  readonly fetchFn?: FetchFn;
  readonly sleep?: (ms: number) => Promise<unknown>;
  readonly now?: () => number;
}

export interface HttpPollResult {
  readonly attempts: number;
  readonly elapsedMs: number;
}

/**
 * Polls the url with GET until it answers 200 or the deadline passes.
 */
export async function waitForHttpOk(options: HttpPollOptions): Promise<HttpPollResult> {
  for (const key of ['timeoutMs', 'intervalMs'] as const) {
    const value = options[key];
    if (!Number.isFinite(value) || value <= 0) {
      throw new WebServerError(WEBSERVER_EXCEPTIONS.INVALID_INPUT, `${key} must be a positive number, got ${value}`);
    }
  }

  const fetchFn: FetchFn = options.fetchFn ?? ((url, init) => fetch(url, init));
  const sleep: (ms: number) => Promise<unknown> = options.sleep ?? delay;
  const now = options.now ?? Date.now;

  const startedAt = now();
  const deadline = startedAt + options.timeoutMs;
  let attempts = 0;
  let lastFailure = 'no attempt made';

  for (;;) {
    attempts++;
    try {
      const response = await fetchFn(options.url, { signal: AbortSignal.timeout(options.intervalMs) });
      if (response.status === 200) {
        logger.info(`${options.url} answered 200 after ${attempts} attempt(s)`);
        return { attempts, elapsedMs: now() - startedAt };
      }
      lastFailure = `HTTP ${response.status}`;
    } catch (error) {
      lastFailure = error instanceof Error ? error.message : String(error);
    }
    logger.debug(`Attempt ${attempts} on ${options.url} failed: ${lastFailure}`);

    if (now() + options.intervalMs > deadline) {
      throw new WebServerError(
        WEBSERVER_EXCEPTIONS.PROBE_TIMEOUT,
        `${options.url} did not answer 200 within ${options.timeoutMs}ms (${attempts} attempts, last: ${lastFailure})`,
      );
    }
    await sleep(options.intervalMs);
  }
}
