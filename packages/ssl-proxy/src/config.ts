import * as os from "node:os";
import * as path from "node:path";
import type { ChallengeType } from "./acme.js";
import { ConfigError } from "./errors.js";
import { silentLogger } from "./logger.js";
import type { ForwardTarget, Logger, ProxyConfig } from "./types.js";

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

/** Origin used when -to is not given. */
export const DEFAULT_ORIGIN = "http://127.0.0.1:80";

/** TLS listen address used when -from is not given. */
export const DEFAULT_LISTEN_ADDRESS = "127.0.0.1:4430";

/** SAN list used for self-signed certificates when -altnames is not given. */
export const DEFAULT_ALT_NAMES = "localhost";

/** Redirect port used when -redirectHTTP is given without a value. */
export const DEFAULT_REDIRECT_PORT = 80;

/** Port ACME CAs connect to for HTTP-01 validation. */
export const HTTP_01_PORT = 80;

/** Port ACME CAs connect to for TLS-ALPN-01 validation. */
export const TLS_ALPN_01_PORT = 443;

/** Per-user state directory holding the default cert/key pair. */
export const USER_STATE_DIR = path.join(os.homedir(), ".ssl-proxy");

/** ACME certificate cache directory, relative to the working directory. */
export const ACME_CACHE_DIR = "certs";

/** Let's Encrypt production directory. */
export const LETSENCRYPT_DIRECTORY_URL = "https://acme-v02.api.letsencrypt.org/directory";

const CERT_FILE = "cert.pem";
const KEY_FILE = "key.pem";

const MAX_PORT = 65535;

// ---------------------------------------------------------------------------
// Flags
// ---------------------------------------------------------------------------

export interface CliFlags {
  to: string;
  from: string;
  cert: string;
  key: string;
  domain: string;
  redirectHTTP: number;
  altnames: string;
  email: string;
  help: boolean;
  version: boolean;
}

export function defaultFlags(): CliFlags {
  return {
    to: DEFAULT_ORIGIN,
    from: DEFAULT_LISTEN_ADDRESS,
    cert: "",
    key: "",
    domain: "",
    redirectHTTP: 0,
    altnames: DEFAULT_ALT_NAMES,
    email: "",
    help: false,
    version: false,
  };
}

/** Parse a port number in 0-65535. */
export function parsePort(value: string, flag: string): number {
  if (!/^\d+$/.test(value)) {
    throw new ConfigError(`invalid value "${value}" for flag ${flag}: must be a port number`);
  }
  const port = parseInt(value, 10);
  if (port > MAX_PORT) {
    throw new ConfigError(`invalid value "${value}" for flag ${flag}: must be between 0 and ${MAX_PORT}`);
  }
  return port;
}

/**
 * Parse command-line flags. Accepts `-flag value`, `-flag=value` and the
 * double-dash forms of each. `-redirectHTTP` may be given bare, meaning
 * port 80.
 */
export function parseFlags(argv: readonly string[]): CliFlags {
  const flags = defaultFlags();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith("-") || arg === "-" || arg === "--") {
      throw new ConfigError(`unexpected argument: ${arg}`);
    }

    let name = arg.replace(/^--?/, "");
    let value: string | undefined;
    const eq = name.indexOf("=");
    if (eq !== -1) {
      value = name.slice(eq + 1);
      name = name.slice(0, eq);
    }

    if (name === "h" || name === "help") {
      flags.help = true;
      continue;
    }
    if (name === "v" || name === "version") {
      flags.version = true;
      continue;
    }

    if (name === "redirectHTTP") {
      if (value === undefined && /^\d+$/.test(argv[i + 1] ?? "")) {
        value = argv[++i];
      }
      if (value === undefined || value === "true") {
        flags.redirectHTTP = DEFAULT_REDIRECT_PORT;
      } else if (value === "false") {
        flags.redirectHTTP = 0;
      } else {
        flags.redirectHTTP = parsePort(value, "-redirectHTTP");
      }
      continue;
    }

    if (value === undefined) {
      value = argv[i + 1];
      if (value === undefined) {
        throw new ConfigError(`flag needs an argument: -${name}`);
      }
      i++;
    }

    switch (name) {
      case "to":
        flags.to = value;
        break;
      case "from":
        flags.from = value;
        break;
      case "cert":
        flags.cert = value;
        break;
      case "key":
        flags.key = value;
        break;
      case "domain":
        flags.domain = value;
        break;
      case "altnames":
        flags.altnames = value;
        break;
      case "email":
        flags.email = value;
        break;
      default:
        throw new ConfigError(`flag provided but not defined: -${name}`);
    }
  }

  return flags;
}

// ---------------------------------------------------------------------------
// Value parsing
// ---------------------------------------------------------------------------

/**
 * Determine the state directory. SSL_PROXY_DIR overrides the per-user
 * default (~/.ssl-proxy).
 */
export function resolveStateDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.SSL_PROXY_DIR || USER_STATE_DIR;
}

/** Prefix http:// when the origin has no scheme. */
export function normalizeOrigin(raw: string): { url: string; assumedHttp: boolean } {
  const trimmed = raw.trim();
  if (/^https?:\/\//i.test(trimmed)) return { url: trimmed, assumedHttp: false };
  return { url: `http://${trimmed}`, assumedHttp: true };
}

/** Parse the -to value into a ForwardTarget. */
export function parseForwardTarget(raw: string): ForwardTarget {
  const { url } = normalizeOrigin(raw);
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new ConfigError(`Unable to parse 'to' url: ${raw}`);
  }

  const protocol = parsed.protocol;
  if (protocol !== "http:" && protocol !== "https:") {
    throw new ConfigError(`Unsupported 'to' url scheme: ${protocol}`);
  }
  if (!parsed.hostname) {
    throw new ConfigError(`Unable to parse 'to' url: ${raw} has no host`);
  }

  return {
    href: parsed.href,
    protocol,
    // URL keeps IPv6 literals bracketed; http.request wants them bare
    hostname: parsed.hostname.replace(/^\[(.*)\]$/, "$1"),
    port: parsed.port ? parseInt(parsed.port, 10) : protocol === "https:" ? 443 : 80,
    host: parsed.host,
    basePath: parsed.pathname === "/" ? "" : parsed.pathname.replace(/\/+$/, ""),
  };
}

/**
 * Split a host:port listen address. An empty host ("":4430) means all
 * interfaces; IPv6 hosts must be bracketed.
 */
export function parseListenAddress(address: string): { host: string | undefined; port: number } {
  const match = /^(?:\[([^\]]+)\]|([^:[\]]*)):(\d+)$/.exec(address.trim());
  if (!match) {
    throw new ConfigError(`Invalid listen address "${address}": expected host:port`);
  }
  const host = match[1] ?? match[2];
  return { host: host || undefined, port: parsePort(match[3], "-from") };
}

/** Split a comma-separated SAN list, dropping blanks and duplicates, keeping order. */
export function parseAltNames(raw: string): string[] {
  const names: string[] = [];
  for (const part of raw.split(",")) {
    const name = part.trim();
    if (name && !names.includes(name)) names.push(name);
  }
  return names;
}

/** Validate a -domain value: a bare hostname, no scheme, port or path. */
export function parseDomain(raw: string): string | null {
  const domain = raw.trim().toLowerCase();
  if (!domain) return null;
  if (!/^[a-z0-9]([a-z0-9-]*[a-z0-9])?(\.[a-z0-9]([a-z0-9-]*[a-z0-9])?)*$/.test(domain)) {
    throw new ConfigError(`Invalid domain "${raw}": expected a bare hostname such as example.com`);
  }
  return domain;
}

// ---------------------------------------------------------------------------
// Config
// ---------------------------------------------------------------------------

/**
 * HTTP-01 is only usable when the redirect listener sits on port 80, where
 * the CA connects. Otherwise TLS-ALPN-01 on the HTTPS listener is tried first.
 */
export function challengePriority(redirectPort: number): ChallengeType[] {
  return redirectPort === HTTP_01_PORT ? ["http-01", "tls-alpn-01"] : ["tls-alpn-01", "http-01"];
}

export interface BuildConfigOptions {
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  /** Base for relative paths; defaults to the working directory. */
  cwd?: string;
}

/**
 * Build the immutable ProxyConfig from parsed flags. Throws ConfigError for
 * malformed values and conflicting flags.
 */
export function buildConfig(flags: CliFlags, options: BuildConfigOptions = {}): ProxyConfig {
  const { env = process.env, logger = silentLogger, cwd = process.cwd() } = options;

  if (normalizeOrigin(flags.to).assumedHttp) {
    logger.info("Assuming -to URL is using http://");
  }
  const origin = parseForwardTarget(flags.to);

  parseListenAddress(flags.from);
  const domain = parseDomain(flags.domain);

  const certPath = flags.cert.trim() || null;
  const keyPath = flags.key.trim() || null;
  if (!domain && (certPath === null) !== (keyPath === null)) {
    throw new ConfigError("-cert and -key must be used together");
  }

  const altNames = parseAltNames(flags.altnames);
  if (altNames.length === 0) {
    throw new ConfigError("-altnames must list at least one name");
  }

  const stateDir = resolveStateDir(env);

  return Object.freeze({
    origin: Object.freeze(origin),
    listenAddress: flags.from.trim(),
    certPath: certPath && path.resolve(cwd, certPath),
    keyPath: keyPath && path.resolve(cwd, keyPath),
    domain,
    redirectPort: flags.redirectHTTP,
    altNames: Object.freeze(altNames),
    defaultCertPath: path.join(stateDir, CERT_FILE),
    defaultKeyPath: path.join(stateDir, KEY_FILE),
    acme: Object.freeze({
      cacheDir: path.resolve(cwd, ACME_CACHE_DIR),
      directoryUrl: env.SSL_PROXY_ACME_DIRECTORY || LETSENCRYPT_DIRECTORY_URL,
      email: flags.email.trim() || null,
      challengePriority: challengePriority(flags.redirectHTTP),
    }),
  });
}
