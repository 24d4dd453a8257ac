#!/usr/bin/env node

import chalk from "chalk";
import * as fs from "node:fs";
import {
  DEFAULT_ALT_NAMES,
  DEFAULT_LISTEN_ADDRESS,
  DEFAULT_ORIGIN,
  buildConfig,
  parseFlags,
} from "./config.js";
import { errorMessage } from "./errors.js";
import { createConsoleLogger } from "./logger.js";
import { startServer } from "./server.js";

/** Grace period (ms) for connections to drain before force-exiting. */
const EXIT_TIMEOUT_MS = 2000;

function readVersion(): string {
  try {
    const pkg: unknown = JSON.parse(
      fs.readFileSync(new URL("../package.json", import.meta.url), "utf-8")
    );
    if (typeof pkg === "object" && pkg !== null && "version" in pkg) {
      return String(pkg.version);
    }
  } catch {
    // Fall through to "unknown"
  }
  return "unknown";
}

function printHelp(): void {
  console.log(`
${chalk.bold("ssl-proxy")} - Terminate TLS locally and forward requests to an HTTP origin.

${chalk.bold("Usage:")}
  ${chalk.cyan("ssl-proxy -from 127.0.0.1:4430 -to 127.0.0.1:8000")}
  ${chalk.cyan("ssl-proxy -from 0.0.0.0:443 -to 127.0.0.1:8000 -domain example.com -redirectHTTP")}

${chalk.bold("Flags:")}
  -to <url>              Origin to forward requests to (default: ${DEFAULT_ORIGIN})
                         http:// is assumed when no scheme is given
  -from <host:port>      Address to accept TLS connections on (default: ${DEFAULT_LISTEN_ADDRESS})
  -cert <path>           TLS certificate file (requires -key)
  -key <path>            TLS private key file (requires -cert)
  -domain <name>         Obtain certificates for this domain from Let's Encrypt.
                         Implies acceptance of the Let's Encrypt terms of service.
  -redirectHTTP [port]   Redirect plain HTTP on this port to HTTPS (bare flag: 80, 0 disables)
  -altnames <list>       Comma-separated DNS names for the self-signed certificate
                         (default: ${DEFAULT_ALT_NAMES})
  -email <address>       Contact address for the Let's Encrypt account
  -h, -help              Show this help
  -version               Print the version

Without -cert/-key or -domain, a self-signed certificate is generated in
~/.ssl-proxy/ on first run and reused afterwards.

${chalk.bold("Environment variables:")}
  SSL_PROXY_DIR=<path>             Override the directory holding cert.pem and key.pem
  SSL_PROXY_ACME_DIRECTORY=<url>   Use another ACME directory (e.g. Let's Encrypt staging)
`);
}

async function main() {
  const logger = createConsoleLogger();
  const flags = parseFlags(process.argv.slice(2));

  if (flags.help) {
    printHelp();
    return;
  }
  if (flags.version) {
    console.log(readVersion());
    return;
  }

  const config = buildConfig(flags, { logger });
  const running = await startServer(config, { logger });

  running.server.on("error", (err: Error) => {
    logger.error(`HTTPS listener failure: ${err.message}`);
    process.exit(1);
  });

  let exiting = false;
  const cleanup = () => {
    if (exiting) return;
    exiting = true;
    running.close().then(
      () => process.exit(0),
      () => process.exit(0)
    );
    // Force exit after a short timeout in case connections don't drain
    setTimeout(() => process.exit(0), EXIT_TIMEOUT_MS).unref();
  };

  process.on("SIGINT", cleanup);
  process.on("SIGTERM", cleanup);
}

main().catch((err: unknown) => {
  const name = err instanceof Error ? err.name : "Error";
  console.error(chalk.red(`${name}:`), errorMessage(err));
  process.exit(1);
});
