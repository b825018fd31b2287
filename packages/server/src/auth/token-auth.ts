/**
 * Reads what admission needs from the WebSocket upgrade request: the access
 * token, the chat id from the path and the client's last-seen sequence.
 */

import type { IncomingMessage } from "node:http";

export type UpgradeRequest = Pick<IncomingMessage, "url" | "headers">;

export const LAST_SEQ_QUERY_PARAM = "last_seq";
export const LAST_SEQ_HEADER = "x-last-seq";

function requestUrl(req: UpgradeRequest): URL | null {
  try {
    return new URL(req.url ?? "/", "http://localhost");
  } catch {
    return null;
  }
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/** Query `access_token`, else an `Authorization: Bearer` header. */
export function tokenFromRequest(req: UpgradeRequest): string | null {
  const fromQuery = requestUrl(req)?.searchParams.get("access_token");
  if (fromQuery) return fromQuery;
  const auth = req.headers.authorization;
  if (typeof auth === "string" && /^Bearer\s+/i.test(auth)) {
    return auth.replace(/^Bearer\s+/i, "").trim() || null;
  }
  return null;
}

/**
 * The chat id in `${basePath}/${chatId}`, or null when the path does not match.
 * Percent-encoded ids are decoded.
 */
export function chatIdFromPath(url: string | undefined, basePath: string): string | null {
  const parsed = requestUrl({ url, headers: {} });
  if (!parsed) return null;
  const prefix = basePath.endsWith("/") ? basePath : `${basePath}/`;
  if (!parsed.pathname.startsWith(prefix)) return null;
  const rest = parsed.pathname.slice(prefix.length);
  if (!rest || rest.includes("/")) return null;
  try {
    return decodeURIComponent(rest);
  } catch {
    return null;
  }
}

export type LastSeenSeqResult = { ok: true; value: number } | { ok: false; reason: string };

/**
 * The last-seen sequence from the `last_seq` query parameter or the
 * `X-Last-Seq` header. Absent means 0; anything but a non-negative integer is
 * an error.
 */
export function parseLastSeenSeq(req: UpgradeRequest): LastSeenSeqResult {
  const raw = requestUrl(req)?.searchParams.get(LAST_SEQ_QUERY_PARAM) ?? firstHeader(req.headers[LAST_SEQ_HEADER]);
  if (raw === undefined || raw === null || raw === "") return { ok: true, value: 0 };
  if (!/^\d+$/.test(raw)) {
    return { ok: false, reason: `Invalid last-seen sequence "${raw}"` };
  }
  const value = Number(raw);
  if (!Number.isSafeInteger(value)) {
    return { ok: false, reason: `Invalid last-seen sequence "${raw}"` };
  }
  return { ok: true, value };
}
