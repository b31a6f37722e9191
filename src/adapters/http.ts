import http from "node:http";
import https from "node:https";
import { AgentInvocationError, classifyFailure } from "../errors.js";
import { createLogger } from "../logger.js";

const log = createLogger("http");

export interface HttpRequestOptions {
  body?: object;
  apiKey?: string;
  timeoutMs: number;
  signal?: AbortSignal;
}

/** Status codes a provider uses for transient overload; the registry may retry these. */
const RETRYABLE_STATUS = new Set([429, 502, 503, 504]);

/**
 * JSON request over node:http/https, shared by the HTTP adapters.
 *
 * Uses the http module (not fetch) so socket timeouts are controllable on
 * long model calls. Every failure is an AgentInvocationError:
 *   status >= 400 → provider (retryable for 429/502/503/504)
 *   socket timeout → timeout
 *   aborted signal → cancelled
 *   anything else on the socket → transport
 */
export function httpRequest(agent: string, method: string, url: string, options: HttpRequestOptions): Promise<string> {
  const { body, apiKey, timeoutMs, signal } = options;

  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AgentInvocationError(agent, "cancelled", `${agent}: request aborted before start`));
      return;
    }

    const parsed = new URL(url);
    const isHttps = parsed.protocol === "https:";
    const transport = isHttps ? https : http;

    const headers: Record<string, string> = {
      "Accept": "application/json",
    };

    const payload = body ? JSON.stringify(body) : undefined;
    if (payload) {
      headers["Content-Type"] = "application/json";
      headers["Content-Length"] = String(Buffer.byteLength(payload));
    }

    if (apiKey) {
      headers["Authorization"] = `Bearer ${apiKey}`;
    }

    let settled = false;
    const fail = (err: AgentInvocationError) => {
      if (settled) return;
      settled = true;
      log.error(agent, err.message);
      reject(err);
    };

    const req = transport.request(
      {
        hostname: parsed.hostname,
        port: parsed.port || (isHttps ? 443 : 80),
        path: parsed.pathname + parsed.search,
        method,
        headers,
        timeout: timeoutMs,
        signal,
      },
      (res) => {
        let data = "";
        res.setEncoding("utf-8");
        res.on("data", (chunk: string) => (data += chunk));
        res.on("end", () => {
          const status = res.statusCode ?? 0;
          if (status >= 400) {
            fail(new AgentInvocationError(agent, "provider", `${agent} API error ${status}: ${data}`, {
              retryable: RETRYABLE_STATUS.has(status),
            }));
            return;
          }
          if (!settled) {
            settled = true;
            resolve(data);
          }
        });
        res.on("error", (err) => {
          fail(new AgentInvocationError(agent, signal?.aborted ? "cancelled" : "transport",
            `${agent} HTTP ${method} response error: ${err.message}`, { cause: err }));
        });
        // A socket dropped mid-body destroys `res` without "end" or "error".
        res.on("close", () => {
          if (!res.complete) {
            fail(new AgentInvocationError(agent, signal?.aborted ? "cancelled" : "transport",
              `${agent} HTTP ${method}: connection closed before the response completed`));
          }
        });
      }
    );

    req.on("error", (err) => {
      const kind = signal?.aborted ? "cancelled" : classifyFailure(err);
      fail(new AgentInvocationError(agent, kind === "provider" ? "transport" : kind,
        `${agent} HTTP ${method} error: ${err.message}`, { cause: err }));
    });

    req.on("timeout", () => {
      fail(new AgentInvocationError(agent, "timeout", `${agent} request timeout after ${timeoutMs}ms`));
      req.destroy();
    });

    if (payload) {
      req.write(payload);
    }
    req.end();
  });
}

/** Parse a JSON body, turning malformed payloads into provider errors. */
export function parseJsonBody<T>(agent: string, raw: string, guard: (value: unknown) => value is T): T {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (err) {
    throw new AgentInvocationError(agent, "provider", `${agent}: malformed JSON response`, { cause: err });
  }
  if (!guard(value)) {
    throw new AgentInvocationError(agent, "provider", `${agent}: unexpected response shape`);
  }
  return value;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
