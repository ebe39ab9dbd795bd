// src/lib/fetchQuery.ts
import got from "got";
import { Credentials } from "./credentials";
import { HttpStatusError, TransportError, errorMessage } from "./errors";
import { log } from "./logger";

export const REQUEST_TIMEOUT_MS = 30_000;
const BODY_EXCERPT_CHARS = 500;

export type QueryResponse = {
  statusCode: number;
  body: Buffer;
};

export type Fetcher = (url: string, creds: Credentials) => Promise<QueryResponse>;

/** Single authenticated GET; no retries, non-2xx responses are returned, not thrown. */
export async function fetchQuery(
  url: string,
  creds: Credentials,
  timeoutMs: number = REQUEST_TIMEOUT_MS
): Promise<QueryResponse> {
  log.info({ url }, "fetch weather query");
  try {
    const res = await got(url, {
      username: creds.username,
      password: creds.password,
      responseType: "buffer",
      timeout: { request: timeoutMs },
      retry: { limit: 0 },
      throwHttpErrors: false,
    });
    log.info({ statusCode: res.statusCode, bytes: res.body.length }, "weather query answered");
    return { statusCode: res.statusCode, body: res.body };
  } catch (e) {
    throw new TransportError(`HTTP: ${errorMessage(e)}`);
  }
}

export function assertOk(res: QueryResponse): QueryResponse {
  if (res.statusCode !== 200) {
    const text = res.body.toString("utf8");
    throw new HttpStatusError(res.statusCode, Array.from(text).slice(0, BODY_EXCERPT_CHARS).join(""));
  }
  return res;
}
