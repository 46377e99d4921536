// HTTP probe layer. Every network check the ranking engine and EOL registry make
// goes through a Prober; failures come back as outcomes, never as exceptions.
import { fetch } from "undici";
import { deadlineSignal } from "../shared/signals.js";
import { ProxyDispatchers } from "./proxy.js";
import { logger } from "../logger.js";

export const USER_AGENT = "apt-mirror-mcp/0.1.0";

export type ProbeFailure =
  | { readonly kind: "not-found"; readonly status: 404 }
  | { readonly kind: "invalid-response"; readonly status: number }
  | { readonly kind: "unreachable"; readonly reason: "timeout" | "connection" | "aborted"; readonly message: string };

/** `not-found` is authoritative; `invalid-response` and `unreachable` are indeterminate. */
export type ProbeOutcome =
  | { readonly kind: "success"; readonly status: number; readonly body: string; readonly elapsedMs: number }
  | ProbeFailure;

export type RateOutcome =
  | { readonly kind: "measured"; readonly bytes: number; readonly elapsedMs: number; readonly bytesPerSecond: number }
  | { readonly kind: "insufficient"; readonly bytes: number; readonly elapsedMs: number }
  | ProbeFailure;

export interface ProbeOptions {
  readonly method?: "GET" | "HEAD";
  readonly timeoutMs: number;
  readonly signal?: AbortSignal;
  /** GET bodies are truncated here; default 64 KiB. */
  readonly maxBodyBytes?: number;
}

export interface RateOptions {
  readonly timeoutMs: number;
  /** Reading stops once this much time has passed since the request started. */
  readonly windowMs: number;
  /** Fewer bytes than this is not a valid measurement. */
  readonly minBytes: number;
  /** Reading stops after this many bytes. */
  readonly maxBytes: number;
  readonly signal?: AbortSignal;
}

export interface Prober {
  probe(url: string, options: ProbeOptions): Promise<ProbeOutcome>;
  streamRate(url: string, options: RateOptions): Promise<RateOutcome>;
}

export function isIndeterminate(outcome: ProbeOutcome | RateOutcome): boolean {
  return outcome.kind === "invalid-response" || outcome.kind === "unreachable";
}

const DEFAULT_MAX_BODY_BYTES = 64 * 1024;

type ByteReader = {
  read(): Promise<{ done: boolean; value?: unknown }>;
  cancel(reason?: unknown): Promise<void>;
};

/** Prober backed by undici fetch, honouring the proxy environment. */
export class HttpProbeClient implements Prober {
  constructor(private readonly dispatchers: ProxyDispatchers = new ProxyDispatchers()) {}

  async probe(url: string, options: ProbeOptions): Promise<ProbeOutcome> {
    const method = options.method ?? "GET";
    const deadline = deadlineSignal(options.timeoutMs, options.signal);
    const start = performance.now();
    try {
      const res = await fetch(url, {
        method,
        headers: { "user-agent": USER_AGENT },
        redirect: "follow",
        signal: deadline.signal,
        dispatcher: this.dispatchers.forUrl(url),
      });
      if (res.status === 404) {
        await discard(res.body);
        return { kind: "not-found", status: 404 };
      }
      if (res.status < 200 || res.status >= 300) {
        await discard(res.body);
        return { kind: "invalid-response", status: res.status };
      }
      let body = "";
      if (method === "GET" && res.body) {
        const limit = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
        const bytes = await readUpTo(res.body.getReader(), limit);
        body = Buffer.from(bytes).toString("utf-8");
      } else {
        await discard(res.body);
      }
      return { kind: "success", status: res.status, body, elapsedMs: Math.round(performance.now() - start) };
    } catch (err) {
      return failureFrom(err, deadline.timedOut(), options.signal);
    } finally {
      deadline.dispose();
    }
  }

  async streamRate(url: string, options: RateOptions): Promise<RateOutcome> {
    const deadline = deadlineSignal(options.timeoutMs, options.signal);
    const start = performance.now();
    let windowTimer: NodeJS.Timeout | undefined;
    try {
      const res = await fetch(url, {
        headers: { "user-agent": USER_AGENT },
        redirect: "follow",
        signal: deadline.signal,
        dispatcher: this.dispatchers.forUrl(url),
      });
      if (res.status === 404) {
        await discard(res.body);
        return { kind: "not-found", status: 404 };
      }
      if (res.status < 200 || res.status >= 300 || !res.body) {
        await discard(res.body);
        return { kind: "invalid-response", status: res.status };
      }
      const reader: ByteReader = res.body.getReader();
      const remainingMs = Math.max(0, options.windowMs - (performance.now() - start));
      // Cancelling the reader resolves the pending read with done: true.
      windowTimer = setTimeout(() => {
        reader.cancel().catch((err: unknown) => logger.debug({ url, err }, "Cancel after bandwidth window failed"));
      }, remainingMs);
      let bytes = 0;
      while (bytes < options.maxBytes) {
        const { done, value } = await reader.read();
        if (done) break;
        if (value instanceof Uint8Array) bytes += value.byteLength;
      }
      if (bytes >= options.maxBytes) await cancelQuietly(reader, url);
      const elapsedMs = Math.max(1, Math.round(performance.now() - start));
      if (bytes < options.minBytes) return { kind: "insufficient", bytes, elapsedMs };
      return { kind: "measured", bytes, elapsedMs, bytesPerSecond: Math.round((bytes * 1000) / elapsedMs) };
    } catch (err) {
      return failureFrom(err, deadline.timedOut(), options.signal);
    } finally {
      if (windowTimer) clearTimeout(windowTimer);
      deadline.dispose();
    }
  }
}

async function readUpTo(reader: ByteReader, limit: number): Promise<Uint8Array> {
  const chunks: Uint8Array[] = [];
  let total = 0;
  while (total < limit) {
    const { done, value } = await reader.read();
    if (done) return concat(chunks, total);
    if (value instanceof Uint8Array) {
      chunks.push(value);
      total += value.byteLength;
    }
  }
  await reader.cancel();
  return concat(chunks, total).subarray(0, limit);
}

function concat(chunks: Uint8Array[], total: number): Uint8Array {
  const out = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return out;
}

async function discard(body: { cancel(): Promise<void> } | null): Promise<void> {
  if (!body) return;
  await body.cancel().catch((err: unknown) => logger.debug({ err }, "Discarding response body failed"));
}

async function cancelQuietly(reader: ByteReader, url: string): Promise<void> {
  await reader.cancel().catch((err: unknown) => logger.debug({ url, err }, "Cancelling stream failed"));
}

/** Map a fetch/read exception onto an `unreachable` outcome. */
export function failureFrom(err: unknown, timedOut: boolean, parent?: AbortSignal): ProbeFailure {
  const message = describeError(err);
  if (timedOut) return { kind: "unreachable", reason: "timeout", message };
  if (parent?.aborted) return { kind: "unreachable", reason: "aborted", message };
  if (message.includes("UND_ERR_CONNECT_TIMEOUT") || message.includes("ETIMEDOUT")) {
    return { kind: "unreachable", reason: "timeout", message };
  }
  return { kind: "unreachable", reason: "connection", message };
}

function describeError(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  const cause: unknown = err.cause;
  if (cause instanceof Error) {
    const code = "code" in cause && typeof cause.code === "string" ? ` (${cause.code})` : "";
    return `${err.message}: ${cause.message}${code}`;
  }
  return err.message;
}
