import * as http from "node:http";
import type { AcmeManager } from "./acme.js";
import { parseListenAddress } from "./config.js";
import { toListenError } from "./errors.js";
import { silentLogger } from "./logger.js";
import type { Logger, ProxyConfig } from "./types.js";
import { escapeHtml } from "./utils.js";

/** 307 keeps the method and body of the original request. */
export const REDIRECT_STATUS = 307;

const HTTPS_PORT = 443;

const WILDCARD_HOSTS = new Set(["0.0.0.0", "::", "::0"]);

/** Picks the host the client is redirected to. */
export type RedirectHostResolver = (req: http.IncomingMessage) => string;

/**
 * Extract the hostname from a Host header value, dropping any port.
 * Returns null when the header is absent or unparsable.
 */
export function hostnameFromHeader(host: string | undefined): string | null {
  if (!host || /[\s/?#@\\]/.test(host)) return null;
  try {
    return new URL(`http://${host}`).hostname || null;
  } catch {
    return null;
  }
}

/**
 * Turn a listen address into a host clients can connect to. Wildcard or
 * empty hosts become localhost; the port is dropped when it is 443.
 */
export function listenAddressToHost(listenAddress: string): string {
  const { host, port } = parseListenAddress(listenAddress);
  let name = !host || WILDCARD_HOSTS.has(host) ? "localhost" : host;
  if (name.includes(":")) name = `[${name}]`;
  return port === HTTPS_PORT ? name : `${name}:${port}`;
}

/**
 * Redirect policy: a configured domain always wins. Otherwise the request's
 * own Host (without port) is used, falling back to the listen address when
 * the header is missing or unparsable.
 */
export function createRedirectHostResolver(
  config: Pick<ProxyConfig, "domain" | "listenAddress">
): RedirectHostResolver {
  const fallback = listenAddressToHost(config.listenAddress);
  return (req) => {
    if (config.domain) return config.domain;
    return hostnameFromHeader(req.headers.host) ?? fallback;
  };
}

export interface RedirectOptions {
  /** When set, ACME HTTP-01 challenges are answered instead of redirected. */
  acme?: AcmeManager;
  logger?: Logger;
}

/** Handler that redirects every request to its https:// equivalent. */
export function createRedirectHandler(
  resolveHost: RedirectHostResolver,
  options: Pick<RedirectOptions, "acme"> = {}
): (req: http.IncomingMessage, res: http.ServerResponse) => void {
  const { acme } = options;

  return (req, res) => {
    if (acme && acme.handleChallenge(req, res)) return;

    const location = `https://${resolveHost(req)}${req.url || "/"}`;
    if (req.method === "GET" || req.method === "HEAD") {
      res.writeHead(REDIRECT_STATUS, {
        Location: location,
        "Content-Type": "text/html; charset=utf-8",
      });
      res.end(`<a href="${escapeHtml(location)}">Temporary Redirect</a>.\n`);
      return;
    }
    res.writeHead(REDIRECT_STATUS, { Location: location });
    res.end();
  };
}

/**
 * Start the plaintext redirect listener on `port` (all interfaces).
 *
 * Never rejects: a bind failure is logged and resolves to null so the HTTPS
 * listener keeps running without automatic redirects.
 */
export function startRedirectServer(
  port: number,
  resolveHost: RedirectHostResolver,
  options: RedirectOptions = {}
): Promise<http.Server | null> {
  const { logger = silentLogger } = options;
  const server = http.createServer(createRedirectHandler(resolveHost, options));

  return new Promise((resolve) => {
    let listening = false;
    server.on("error", (err) => {
      logger.error("HTTP redirection server failure");
      logger.error(toListenError(err, `:${port}`).message);
      if (!listening) resolve(null);
    });
    server.listen(port, () => {
      listening = true;
      resolve(server);
    });
  });
}
