/**
 * Retry layer for store calls.
 *
 * Each attempt is reduced to a CallOutcome; only "retryable" outcomes are
 * attempted again, with exponential delay. Fatal outcomes surface on the first try.
 */

export type CallOutcome<T> =
  | { kind: "ok"; value: T }
  | { kind: "retryable"; error: unknown; status?: number }
  | { kind: "fatal"; error: unknown; status?: number };

export type BackoffPolicy = {
  maxAttempts: number;
  baseDelayMs: number;
  multiplier: number;
  maxDelayMs: number;
};

export const DEFAULT_BACKOFF: BackoffPolicy = {
  maxAttempts: 5,
  baseDelayMs: 1000,
  multiplier: 2,
  maxDelayMs: 30_000
};

const RETRYABLE_STATUSES = new Set([429, 500, 502, 503, 504]);

const NETWORK_ERROR_PATTERNS = [
  "econnreset",
  "econnrefused",
  "etimedout",
  "eai_again",
  "socket hang up",
  "network",
  "fetch failed"
];

export class TransportError extends Error {
  readonly retryable: boolean;
  readonly status?: number;
  readonly attempts: number;

  constructor(message: string, opts: { retryable: boolean; status?: number; attempts: number; cause?: unknown }) {
    super(message, { cause: opts.cause });
    this.name = "TransportError";
    this.retryable = opts.retryable;
    this.status = opts.status;
    this.attempts = opts.attempts;
  }
}

export function statusOf(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  if ("status" in err && typeof err.status === "number") return err.status;
  if ("response" in err && typeof err.response === "object" && err.response !== null) {
    const res = err.response;
    if ("status" in res && typeof res.status === "number") return res.status;
  }
  if ("code" in err && typeof err.code === "number") return err.code;
  return undefined;
}

function messageOf(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function classifyError<T>(err: unknown): CallOutcome<T> {
  const status = statusOf(err);
  if (status !== undefined) {
    return RETRYABLE_STATUSES.has(status) ? { kind: "retryable", error: err, status } : { kind: "fatal", error: err, status };
  }
  let text = messageOf(err).toLowerCase();
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    text += ` ${err.code.toLowerCase()}`;
  }
  return NETWORK_ERROR_PATTERNS.some((p) => text.includes(p)) ? { kind: "retryable", error: err } : { kind: "fatal", error: err };
}

export async function attempt<T>(fn: () => Promise<T>): Promise<CallOutcome<T>> {
  try {
    return { kind: "ok", value: await fn() };
  } catch (err) {
    return classifyError<T>(err);
  }
}

export function delayFor(policy: BackoffPolicy, attemptNo: number): number {
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * Math.pow(policy.multiplier, attemptNo - 1));
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function withBackoff<T>(
  tag: string,
  fn: () => Promise<T>,
  policy: BackoffPolicy = DEFAULT_BACKOFF,
  wait: (ms: number) => Promise<void> = sleep
): Promise<T> {
  for (let n = 1; ; n++) {
    const outcome = await attempt(fn);
    if (outcome.kind === "ok") return outcome.value;

    if (outcome.kind === "fatal") {
      throw new TransportError(`${tag}: ${messageOf(outcome.error)}`, {
        retryable: false,
        status: outcome.status,
        attempts: n,
        cause: outcome.error
      });
    }

    if (n >= policy.maxAttempts) {
      throw new TransportError(`${tag}: gave up after ${n} attempts: ${messageOf(outcome.error)}`, {
        retryable: true,
        status: outcome.status,
        attempts: n,
        cause: outcome.error
      });
    }

    await wait(delayFor(policy, n));
  }
}
