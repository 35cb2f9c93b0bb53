import type { Context } from "hono";
import { config } from "../../config/index.js";

/** Strip IPv6-mapped-IPv4 prefix (::ffff:) for comparison. */
function normalizeIp(ip: string): string {
  return ip.startsWith("::ffff:") ? ip.slice(7) : ip;
}

const trustedProxies = new Set(config.trustedProxyIps);

/**
 * Determine the client's network address.
 *
 * - If `socketAddr` is a trusted proxy, use the **last** (rightmost)
 *   `X-Forwarded-For` value, the hop the proxy itself appended.
 * - Otherwise use `socketAddr`; a client can write any XFF it likes.
 * - Returns undefined when neither is available.
 */
export function getClientIp(
  xffHeader: string | undefined,
  socketAddr: string | undefined,
  trusted: ReadonlySet<string> = trustedProxies,
): string | undefined {
  const normalizedSocket = socketAddr ? normalizeIp(socketAddr) : undefined;

  if (xffHeader && normalizedSocket && trusted.has(normalizedSocket)) {
    const parts = xffHeader.split(",");
    const last = parts[parts.length - 1]?.trim();
    if (last) return last;
  }

  return normalizedSocket;
}

/** Socket peer address as exposed by @hono/node-server via `env.incoming`. */
function socketAddress(c: Context): string | undefined {
  const env: unknown = c.env;
  if (typeof env !== "object" || env === null || !("incoming" in env)) return undefined;
  const incoming = env.incoming;
  if (typeof incoming !== "object" || incoming === null || !("socket" in incoming)) return undefined;
  const socket = incoming.socket;
  if (typeof socket !== "object" || socket === null || !("remoteAddress" in socket)) return undefined;
  return typeof socket.remoteAddress === "string" ? socket.remoteAddress : undefined;
}

/** Read XFF and the socket address off a Hono context. */
export function getClientIpFromContext(c: Context, trusted?: ReadonlySet<string>): string | undefined {
  return getClientIp(c.req.header("x-forwarded-for"), socketAddress(c), trusted);
}
