/**
 * In-process fetch stand-in and request wiring shared by the test suites
 */

import { vi } from "vitest";
import type { RetryConfig, SessionContext } from "../core/types.js";
import { ApiRequester } from "../core/api.js";
import { RequestDispatcher, type FetchLike } from "../core/dispatcher.js";
import { RetryStrategy } from "../strategies/retry.js";
import { IdempotencyResolver } from "../strategies/idempotency.js";
import { MemoryObservability } from "../observability/noop.js";
import { createSessionContext, type SessionContextInit } from "../auth/session.js";
import { LiqlClient } from "../liql/client.js";

export const COMMUNITY_URL = "https://community.example.com";
export const V2_BASE = `${COMMUNITY_URL}/api/2.0`;
export const V1_BASE = `${COMMUNITY_URL}/restapi/vc`;

export interface ReplyInit {
  status?: number;
  json?: unknown;
  text?: string;
  headers?: Record<string, string>;
}

export type Reply = ReplyInit | Error;

function toResponse(reply: ReplyInit): Response {
  const headers = new Headers(reply.headers);
  let body: string | null = null;
  if (reply.json !== undefined) {
    body = JSON.stringify(reply.json);
    if (!headers.has("content-type")) headers.set("content-type", "application/json");
  } else if (reply.text !== undefined) {
    body = reply.text;
  }
  return new Response(body, { status: reply.status ?? 200, headers });
}

/**
 * A fetch mock that answers with the queued replies in order. The last reply
 * repeats once the queue runs dry. Errors are thrown instead of answered.
 */
export function queueFetch(...replies: Reply[]) {
  const queue = [...replies];
  return vi.fn(async (_input: string, _init?: RequestInit): Promise<Response> => {
    const next = queue.length > 1 ? queue.shift() : queue[0];
    if (next === undefined) {
      throw new Error("No reply queued");
    }
    if (next instanceof Error) {
      throw next;
    }
    return toResponse(next);
  });
}

export interface SentRequest {
  url: string;
  method: string | undefined;
  headers: Headers;
  body: RequestInit["body"];
}

/**
 * Reads back the nth request handed to a fetch mock.
 */
export function sentRequest(fetchMock: ReturnType<typeof queueFetch>, index = 0): SentRequest {
  const call = fetchMock.mock.calls[index];
  if (call === undefined) {
    throw new Error(`No request #${index} was sent`);
  }
  const [url, init] = call;
  return { url, method: init?.method, headers: new Headers(init?.headers), body: init?.body };
}

export function sentJson(fetchMock: ReturnType<typeof queueFetch>, index = 0): unknown {
  const { body } = sentRequest(fetchMock, index);
  if (typeof body !== "string") {
    throw new Error(`Request #${index} has no JSON body`);
  }
  return JSON.parse(body);
}

export interface TestApiOptions {
  session?: Partial<SessionContextInit>;
  retry?: Partial<RetryConfig>;
}

export interface TestApi {
  api: ApiRequester;
  dispatcher: RequestDispatcher;
  liql: LiqlClient;
  observability: MemoryObservability;
  session: SessionContext;
}

export function createTestApi(fetch: FetchLike, options: TestApiOptions = {}): TestApi {
  const observability = new MemoryObservability();
  const dispatcher = new RequestDispatcher({
    retryStrategy: new RetryStrategy({ baseDelay: 0, maxDelay: 0, jitter: false, ...options.retry }),
    idempotencyResolver: new IdempotencyResolver(),
    observability: [observability],
    timeout: 1000,
    fetch,
  });
  const session = createSessionContext({
    communityUrl: COMMUNITY_URL,
    authType: "session-key",
    token: "test-session-key",
    ...options.session,
  });
  const api = new ApiRequester(session, dispatcher);
  return { api, dispatcher, liql: new LiqlClient(api), observability, session };
}
