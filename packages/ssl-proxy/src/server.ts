import type * as http from "node:http";
import type * as net from "node:net";
import { loadTlsOptions, resolveTlsSource, type ResolveTlsSourceOptions } from "./certs.js";
import { HTTP_01_PORT, TLS_ALPN_01_PORT, parseListenAddress } from "./config.js";
import { ListenError, errorMessage, toListenError } from "./errors.js";
import { createConsoleLogger } from "./logger.js";
import { createProxyServer, type ProxyServer } from "./proxy.js";
import { createRedirectHostResolver, startRedirectServer } from "./redirect.js";
import type { Logger, ProxyConfig, TlsSource } from "./types.js";


export interface StartServerOptions {
  logger?: Logger;
  /** Overrides for certificate provisioning (key generator, ACME factory). */
  provisioning?: Omit<ResolveTlsSourceOptions, "logger">;
}

export interface RunningProxy {
  server: ProxyServer;
  /** Null when redirects are disabled or the redirect listener failed to bind. */
  redirectServer: http.Server | null;
  tlsSource: TlsSource;
  /** Stop both listeners. Used on SIGINT/SIGTERM. */
  close(): Promise<void>;
}

function listen(server: net.Server, port: number, host: string | undefined): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (err: Error) => reject(err);
    server.once("error", onError);
    server.listen(port, host, () => {
      server.off("error", onError);
      resolve();
    });
  });
}

function closeServer(server: net.Server): Promise<void> {
  return new Promise((resolve) => server.close(() => resolve()));
}

/**
 * Explain which ACME validation methods cannot reach this process. HTTP-01
 * needs the redirect listener on port 80; TLS-ALPN-01 needs the HTTPS
 * listener on port 443.
 */
export function acmeWarnings(
  config: Pick<ProxyConfig, "domain" | "redirectPort" | "listenAddress">,
  listenPort: number
): string[] {
  const warnings: string[] = [];
  const httpReachable = config.redirectPort === HTTP_01_PORT;
  const tlsReachable = listenPort === TLS_ALPN_01_PORT;

  if (config.redirectPort > 0 && !httpReachable) {
    warnings.push(
      `WARN: HTTP-01 validation always connects to port ${HTTP_01_PORT}; the redirect listener on port ${config.redirectPort} cannot answer it`
    );
  }
  if (!httpReachable && !tlsReachable) {
    warnings.push(
      `WARN: ACME needs -from on port ${TLS_ALPN_01_PORT} (TLS-ALPN-01) or -redirectHTTP on port ${HTTP_01_PORT} (HTTP-01); listening on ${config.listenAddress}, certificates for ${config.domain} may NOT be issued`
    );
  }
  return warnings;
}

/**
 * Provision certificates and start the listeners.
 *
 * The redirect listener (when `redirectPort` > 0) starts first and runs
 * independently: its failure is only logged. The HTTPS listener starts last;
 * any failure there rejects with a ListenError, as do TLS material problems.
 * Provisioning errors (ConfigError, GenerationError, PersistenceError)
 * propagate unchanged.
 */
export async function startServer(
  config: ProxyConfig,
  options: StartServerOptions = {}
): Promise<RunningProxy> {
  const logger = options.logger ?? createConsoleLogger();
  const { host, port } = parseListenAddress(config.listenAddress);

  const tlsSource = resolveTlsSource(config, { ...options.provisioning, logger });
  const tlsOptions = loadTlsOptions(tlsSource);
  const acme = tlsSource.kind === "acme" ? tlsSource.manager : undefined;

  logger.success(
    `Proxying calls from https://${config.listenAddress} (SSL/TLS) to ${config.origin.href}`
  );

  let redirect: Promise<http.Server | null> = Promise.resolve(null);
  if (config.redirectPort > 0) {
    logger.info(
      `Also redirecting http requests on port ${config.redirectPort} to https requests on ${config.domain ?? config.listenAddress}`
    );
    redirect = startRedirectServer(config.redirectPort, createRedirectHostResolver(config), {
      acme,
      logger,
    });
  }

  if (tlsSource.kind === "acme") {
    logger.info(
      `Domain specified, using LetsEncrypt to autogenerate and serve certs for ${tlsSource.domain}`
    );
    for (const warning of acmeWarnings(config, port)) logger.warn(warning);
  }

  const shutdownRedirect = async () => {
    const redirectServer = await redirect;
    if (redirectServer) await closeServer(redirectServer);
  };

  let server: ProxyServer;
  try {
    server = createProxyServer({
      target: config.origin,
      tls: tlsOptions,
      onError: (err) => logger.error(err.message),
    });
  } catch (err: unknown) {
    await shutdownRedirect();
    throw new ListenError(`Invalid TLS configuration: ${errorMessage(err)}`, config.listenAddress, {
      cause: err,
    });
  }

  try {
    await listen(server, port, host);
  } catch (err: unknown) {
    await shutdownRedirect();
    throw toListenError(err, config.listenAddress);
  }

  const redirectServer = await redirect;

  return {
    server,
    redirectServer,
    tlsSource,
    close: async () => {
      await Promise.all([
        closeServer(server),
        redirectServer ? closeServer(redirectServer) : Promise.resolve(),
      ]);
    },
  };
}
