import * as http from "node:http";
import * as http2 from "node:http2";
import * as https from "node:https";
import * as net from "node:net";
import type * as stream from "node:stream";
import * as tls from "node:tls";
import { ACME_TLS_ALPN_PROTOCOL } from "./acme.js";
import { readAlpnProtocols } from "./client-hello.js";
import { ForwardError } from "./errors.js";
import type { ForwardTarget, ProxyServerOptions } from "./types.js";
import { isErrnoException } from "./utils.js";

/**
 * Hop-by-hop headers. They describe a single connection leg and are never
 * forwarded in either direction.
 */
const HOP_BY_HOP_HEADERS = new Set([
  "connection",
  "keep-alive",
  "proxy-connection",
  "proxy-authenticate",
  "proxy-authorization",
  "te",
  "trailer",
  "transfer-encoding",
  "upgrade",
]);

export type RequestHandler = (req: http.IncomingMessage, res: http.ServerResponse) => void;

export type UpgradeHandler = (req: http.IncomingMessage, socket: stream.Duplex, head: Buffer) => void;

export interface ForwarderOptions {
  /** Whether inbound requests arrived over TLS (sets X-Forwarded-Proto). */
  tls?: boolean;
  /** Called for each request the origin could not serve; defaults to console.error. */
  onError?: (error: ForwardError) => void;
}

/**
 * Get the effective host value from a request.
 * HTTP/2 uses the :authority pseudo-header; HTTP/1.1 uses Host.
 */
function getRequestHost(req: http.IncomingMessage): string {
  const authority = req.headers[":authority"];
  if (typeof authority === "string" && authority) return authority;
  return req.headers.host || "";
}

/**
 * Copy headers, dropping HTTP/2 pseudo-headers, hop-by-hop headers and any
 * header listed in the Connection header.
 */
export function stripHopByHopHeaders(headers: http.IncomingHttpHeaders): http.OutgoingHttpHeaders {
  const connection = headers.connection;
  const listed = new Set(
    typeof connection === "string"
      ? connection
          .split(",")
          .map((h) => h.trim().toLowerCase())
          .filter(Boolean)
      : []
  );

  const result: http.OutgoingHttpHeaders = {};
  for (const [key, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    const name = key.toLowerCase();
    if (name.startsWith(":") || HOP_BY_HOP_HEADERS.has(name) || listed.has(name)) continue;
    result[name] = value;
  }
  return result;
}

/**
 * Build X-Forwarded-* headers for a proxied request.
 */
function buildForwardedHeaders(req: http.IncomingMessage, tls: boolean): Record<string, string> {
  const headers: Record<string, string> = {};
  const remoteAddress = req.socket.remoteAddress || "127.0.0.1";
  const prior = req.headers["x-forwarded-for"];
  const hostHeader = getRequestHost(req);

  headers["x-forwarded-for"] = prior ? `${prior}, ${remoteAddress}` : remoteAddress;
  headers["x-forwarded-proto"] = tls ? "https" : "http";
  if (hostHeader) headers["x-forwarded-host"] = hostHeader;

  return headers;
}

/** Join the target's base path and the inbound request URI. */
function joinPath(basePath: string, url: string | undefined): string {
  const requestPath = url && url.startsWith("/") ? url : `/${url || ""}`;
  return basePath ? `${basePath}${requestPath}` : requestPath;
}

function sendRequest(
  target: ForwardTarget,
  options: http.RequestOptions,
  onResponse?: (res: http.IncomingMessage) => void
): http.ClientRequest {
  const requestOptions: http.RequestOptions = {
    ...options,
    hostname: target.hostname,
    port: target.port,
  };
  return target.protocol === "https:"
    ? https.request(requestOptions, onResponse)
    : http.request(requestOptions, onResponse);
}

/**
 * Build a request handler that forwards every request to `target`.
 *
 * Method, path, query and body stream are preserved and the Host header is
 * rewritten to the target. The origin's status, headers and body are streamed
 * back. When the origin cannot be reached the client gets a 502; the failure
 * never affects other requests.
 */
export function createForwarder(target: ForwardTarget, options: ForwarderOptions = {}): RequestHandler {
  const { tls = true, onError = (err: ForwardError) => console.error(err.message) } = options;

  return (req, res) => {
    const headers = stripHopByHopHeaders(req.headers);
    Object.assign(headers, buildForwardedHeaders(req, tls));
    headers.host = target.host;

    const proxyReq = sendRequest(
      target,
      { method: req.method, path: joinPath(target.basePath, req.url), headers },
      (proxyRes) => {
        res.writeHead(proxyRes.statusCode || 502, stripHopByHopHeaders(proxyRes.headers));
        proxyRes.pipe(res);
        proxyRes.on("error", () => res.destroy());
      }
    );

    proxyReq.on("error", (err) => {
      onError(
        new ForwardError(`Proxy error for ${req.method} ${req.url} -> ${target.href}: ${err.message}`, {
          cause: err,
        })
      );
      if (res.headersSent) {
        res.destroy();
        return;
      }
      const message =
        isErrnoException(err) && err.code === "ECONNREFUSED"
          ? "Bad Gateway: the origin refused the connection."
          : "Bad Gateway: the origin could not be reached.";
      res.writeHead(502, { "Content-Type": "text/plain" });
      res.end(message);
    });

    // Abort the outgoing request if the client disconnects
    res.on("close", () => {
      if (!res.writableEnded && !proxyReq.destroyed) {
        proxyReq.destroy();
      }
    });

    req.on("error", () => {
      if (!proxyReq.destroyed) {
        proxyReq.destroy();
      }
    });

    req.pipe(proxyReq);
  };
}

/** Write a status line and raw header pairs as an HTTP/1.1 response head. */
function writeRawHead(socket: stream.Duplex, statusLine: string, rawHeaders: string[]): void {
  const lines = [statusLine];
  for (let i = 0; i + 1 < rawHeaders.length; i += 2) {
    lines.push(`${rawHeaders[i]}: ${rawHeaders[i + 1]}`);
  }
  socket.write(`${lines.join("\r\n")}\r\n\r\n`);
}

/**
 * Build an upgrade handler that tunnels WebSocket (and other Upgrade)
 * requests to `target`. Connection and Upgrade headers are kept here, since
 * the handshake needs them.
 */
export function createUpgradeForwarder(
  target: ForwardTarget,
  options: ForwarderOptions = {}
): UpgradeHandler {
  const { tls = true, onError = (err: ForwardError) => console.error(err.message) } = options;

  return (req, socket, head) => {
    const headers: http.OutgoingHttpHeaders = { ...req.headers };
    for (const key of Object.keys(headers)) {
      if (key.startsWith(":")) delete headers[key];
    }
    Object.assign(headers, buildForwardedHeaders(req, tls));
    headers.host = target.host;

    const proxyReq = sendRequest(target, {
      method: req.method,
      path: joinPath(target.basePath, req.url),
      headers,
    });

    proxyReq.on("upgrade", (proxyRes, proxySocket, proxyHead) => {
      // Relay the origin's own 101 so Sec-WebSocket-Accept, subprotocol and
      // extension headers reach the client unchanged.
      writeRawHead(socket, "HTTP/1.1 101 Switching Protocols", proxyRes.rawHeaders);
      if (proxyHead.length > 0) {
        socket.write(proxyHead);
      }
      proxySocket.pipe(socket);
      socket.pipe(proxySocket);

      proxySocket.on("error", () => socket.destroy());
      socket.on("error", () => proxySocket.destroy());
    });

    proxyReq.on("error", (err) => {
      onError(
        new ForwardError(`WebSocket proxy error for ${req.url} -> ${target.href}: ${err.message}`, {
          cause: err,
        })
      );
      socket.destroy();
    });

    // The origin refused to upgrade: pass its plain response through.
    proxyReq.on("response", (res) => {
      if (socket.destroyed) return;
      writeRawHead(socket, `HTTP/1.1 ${res.statusCode} ${res.statusMessage}`, res.rawHeaders);
      res.pipe(socket);
    });

    if (head.length > 0) {
      proxyReq.write(head);
    }
    proxyReq.end();
  };
}

/** Server type returned by createProxyServer. */
export type ProxyServer = net.Server;

/**
 * Front listener that reads each connection's ClientHello and hands the
 * socket to the challenge server when the client offers acme-tls/1, or to
 * the HTTPS server otherwise. Closing it closes both inner servers.
 */
class AlpnDispatchServer extends net.Server {
  constructor(
    private readonly https: net.Server,
    private readonly challenge: net.Server
  ) {
    super();
    this.on("connection", (socket: net.Socket) => this.dispatch(socket));
  }

  close(callback?: (err?: Error) => void): this {
    this.https.close();
    this.challenge.close();
    return super.close(callback);
  }

  private dispatch(socket: net.Socket): void {
    let buffered = Buffer.alloc(0);

    const detach = () => {
      socket.off("readable", onReadable);
      socket.off("error", onAbort);
      socket.off("end", onAbort);
    };
    const onAbort = () => {
      detach();
      socket.destroy();
    };
    const onReadable = () => {
      let chunk: Buffer | null;
      while ((chunk = socket.read()) !== null) {
        buffered = Buffer.concat([buffered, chunk]);
      }
      const protocols = readAlpnProtocols(buffered);
      if (protocols === undefined) return;

      detach();
      socket.unshift(buffered);
      const target = protocols.includes(ACME_TLS_ALPN_PROTOCOL) ? this.challenge : this.https;
      target.emit("connection", socket);
    };

    socket.on("readable", onReadable);
    socket.on("error", onAbort);
    socket.on("end", onAbort);
  }
}

/**
 * Create the HTTPS listener: an HTTP/2 secure server with HTTP/1.1 fallback
 * (`allowHTTP1: true`) whose every request is forwarded to `target`.
 * WebSocket upgrades arrive over HTTP/1.1 connections and are tunnelled.
 *
 * With `tls.challengeSNICallback`, connections offering the acme-tls/1
 * protocol are answered by a separate TLS server that only presents the
 * TLS-ALPN-01 challenge certificate and then closes.
 *
 * Throws synchronously when the TLS material is unusable.
 */
export function createProxyServer(options: ProxyServerOptions): ProxyServer {
  const { target, tls: tlsOptions, onError } = options;

  const handleRequest = createForwarder(target, { tls: true, onError });
  const handleUpgrade = createUpgradeForwarder(target, { tls: true, onError });

  const server = http2.createSecureServer({
    cert: tlsOptions.cert,
    key: tlsOptions.key,
    allowHTTP1: true,
    ...(tlsOptions.SNICallback ? { SNICallback: tlsOptions.SNICallback } : {}),
  });
  // With allowHTTP1, the 'request' event receives objects compatible with
  // http.IncomingMessage / http.ServerResponse. Cast explicitly to satisfy TypeScript.
  server.on("request", (req: http2.Http2ServerRequest, res: http2.Http2ServerResponse) => {
    handleRequest(req as unknown as http.IncomingMessage, res as unknown as http.ServerResponse);
  });
  server.on("upgrade", (req: http.IncomingMessage, socket: net.Socket, head: Buffer) => {
    handleUpgrade(req, socket, head);
  });

  if (!tlsOptions.challengeSNICallback) return server;

  // The handshake itself is the validation; nothing is served afterwards.
  const challengeServer = tls.createServer(
    { ALPNProtocols: [ACME_TLS_ALPN_PROTOCOL], SNICallback: tlsOptions.challengeSNICallback },
    (socket) => socket.end()
  );
  return new AlpnDispatchServer(server, challengeServer);
}
