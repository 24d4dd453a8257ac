import acme from "acme-client";
import * as crypto from "node:crypto";
import * as fs from "node:fs";
import type * as http from "node:http";
import * as path from "node:path";
import * as tls from "node:tls";
import { ProxyError, errorMessage } from "./errors.js";
import type { SNICallback } from "./types.js";
import { fileExists, fixOwnership, isErrnoException } from "./utils.js";

/** Cached certificates are re-issued once they are this close to expiry (30 days). */
const RENEW_BEFORE_MS = 30 * 24 * 60 * 60 * 1000;

/** Path prefix of HTTP-01 challenge requests. */
export const ACME_CHALLENGE_PREFIX = "/.well-known/acme-challenge/";

/** File name of the ACME account key inside the cache directory. */
const ACCOUNT_KEY_FILE = "acme-account-key.pem";

/** ALPN protocol ACME validation servers negotiate for TLS-ALPN-01. */
export const ACME_TLS_ALPN_PROTOCOL = "acme-tls/1";

export type ChallengeType = "http-01" | "tls-alpn-01";

/** Certificate presented to a TLS-ALPN-01 validation connection. */
export interface ChallengeCertificate {
  cert: Buffer | string;
  key: Buffer | string;
}

/** Challenges published by an issuer while the CA validates a domain. */
export interface ChallengeStore {
  /** HTTP-01 key authorizations, keyed by token. */
  http: Map<string, string>;
  /** TLS-ALPN-01 certificates, keyed by hostname. */
  tlsAlpn: Map<string, ChallengeCertificate>;
}

export interface IssuedCertificate {
  /** PEM certificate chain. */
  cert: string;
  /** PEM private key. */
  key: string;
}

/** Something that can obtain a certificate for a hostname from an ACME CA. */
export interface CertificateIssuer {
  issue(hostname: string, challenges: ChallengeStore): Promise<IssuedCertificate>;
}

export interface AcmeClientIssuerOptions {
  directoryUrl: string;
  accountKeyPath: string;
  email: string | null;
  /** Challenge types to attempt, most preferred first. */
  challengePriority: readonly ChallengeType[];
}

/**
 * Issues certificates with acme-client. The terms of service are accepted
 * automatically. Challenges are published through the shared ChallengeStore:
 * HTTP-01 tokens for the plaintext listener, TLS-ALPN-01 certificates for the
 * HTTPS listener.
 */
export class AcmeClientIssuer implements CertificateIssuer {
  constructor(private readonly options: AcmeClientIssuerOptions) {}

  async issue(hostname: string, challenges: ChallengeStore): Promise<IssuedCertificate> {
    const client = new acme.Client({
      directoryUrl: this.options.directoryUrl,
      accountKey: await this.loadAccountKey(),
    });
    const [key, csr] = await acme.crypto.createCsr({ commonName: hostname, altNames: [hostname] });
    const cert = await client.auto({
      csr,
      email: this.options.email ?? undefined,
      termsOfServiceAgreed: true,
      challengePriority: [...this.options.challengePriority],
      challengeCreateFn: async (authz, challenge, keyAuthorization) => {
        if (challenge.type === "http-01") {
          challenges.http.set(challenge.token, keyAuthorization);
        } else if (challenge.type === "tls-alpn-01") {
          const [alpnKey, alpnCert] = await acme.crypto.createAlpnCertificate(authz, keyAuthorization);
          challenges.tlsAlpn.set(authz.identifier.value.toLowerCase(), {
            cert: alpnCert,
            key: alpnKey,
          });
        }
      },
      challengeRemoveFn: async (authz, challenge) => {
        if (challenge.type === "http-01") {
          challenges.http.delete(challenge.token);
        } else if (challenge.type === "tls-alpn-01") {
          challenges.tlsAlpn.delete(authz.identifier.value.toLowerCase());
        }
      },
    });
    return { cert, key: key.toString("utf-8") };
  }

  private async loadAccountKey(): Promise<Buffer> {
    const { accountKeyPath } = this.options;
    try {
      return await fs.promises.readFile(accountKeyPath);
    } catch (err: unknown) {
      if (!isErrnoException(err) || err.code !== "ENOENT") throw err;
    }
    const key = await acme.crypto.createPrivateKey();
    await fs.promises.mkdir(path.dirname(accountKeyPath), { recursive: true, mode: 0o700 });
    await fs.promises.writeFile(accountKeyPath, key, { mode: 0o600 });
    return key;
  }
}

export interface AcmeManagerOptions {
  /** The only hostname certificates may be issued for. */
  domain: string;
  /** Directory where issued certificates are cached between restarts. */
  cacheDir: string;
  issuer: CertificateIssuer;
  /** Optional error logger; defaults to console.error. */
  onError?: (message: string) => void;
}

/** Build the default manager: acme-client issuer, account key kept in the cache dir. */
export function createAcmeManager(options: {
  domain: string;
  cacheDir: string;
  directoryUrl: string;
  email: string | null;
  challengePriority: readonly ChallengeType[];
  onError?: (message: string) => void;
}): AcmeManager {
  const issuer = new AcmeClientIssuer({
    directoryUrl: options.directoryUrl,
    accountKeyPath: path.join(options.cacheDir, ACCOUNT_KEY_FILE),
    email: options.email,
    challengePriority: options.challengePriority,
  });
  return new AcmeManager({
    domain: options.domain,
    cacheDir: options.cacheDir,
    issuer,
    onError: options.onError,
  });
}

/**
 * Sanitize a hostname for use as a filename.
 * Replaces dots with underscores and removes non-alphanumeric chars (except - and _).
 */
function sanitizeHostForFilename(hostname: string): string {
  return hostname.replace(/\./g, "_").replace(/[^a-z0-9_-]/gi, "");
}

/** Expiry of a PEM certificate in epoch ms, or 0 when it cannot be parsed. */
function certificateExpiry(certPem: Buffer | string): number {
  try {
    return new Date(new crypto.X509Certificate(certPem).validTo).getTime();
  } catch {
    return 0;
  }
}

/** Whether a certificate expiring at `expiresAt` is still outside the renewal window. */
function isFresh(expiresAt: number): boolean {
  return Date.now() + RENEW_BEFORE_MS < expiresAt;
}

function normalizeServername(servername: string): string {
  return servername.toLowerCase().replace(/\.$/, "");
}

interface CachedContext {
  ctx: tls.SecureContext;
  expiresAt: number;
}

/**
 * Serves ACME-issued certificates at TLS handshake time.
 *
 * Lookup order for a hostname: memory cache, then the on-disk cache, then a
 * fresh issuance through the configured issuer. Entries of either cache that
 * are inside the renewal window are skipped, so a long-running process
 * re-issues before expiry. A pending-promise map deduplicates concurrent
 * handshakes for the same hostname.
 */
export class AcmeManager {
  /** Pending challenges, answered by `handleChallenge` and `challengeSNICallback`. */
  readonly challenges: ChallengeStore = { http: new Map(), tlsAlpn: new Map() };
  readonly domain: string;
  readonly cacheDir: string;

  private readonly cache = new Map<string, CachedContext>();
  private readonly pending = new Map<string, Promise<tls.SecureContext>>();
  private readonly issuer: CertificateIssuer;
  private readonly onError: (message: string) => void;

  constructor(options: AcmeManagerOptions) {
    this.domain = options.domain.toLowerCase();
    this.cacheDir = options.cacheDir;
    this.issuer = options.issuer;
    this.onError = options.onError ?? ((msg: string) => console.error(msg));
  }

  /** Throws unless `hostname` is the configured domain. */
  checkHost(hostname: string): void {
    if (hostname !== this.domain) {
      throw new ProxyError(`acme: host "${hostname}" not configured in host whitelist`);
    }
  }

  async getSecureContext(servername: string): Promise<tls.SecureContext> {
    const hostname = normalizeServername(servername);
    this.checkHost(hostname);

    const cached = this.cache.get(hostname);
    if (cached && isFresh(cached.expiresAt)) return cached.ctx;

    const inFlight = this.pending.get(hostname);
    if (inFlight) return inFlight;

    const promise = this.loadOrIssue(hostname)
      .then((entry) => {
        this.cache.set(hostname, entry);
        return entry.ctx;
      })
      .finally(() => {
        this.pending.delete(hostname);
      });
    this.pending.set(hostname, promise);
    return promise;
  }

  /** SNI callback for the HTTPS listener. */
  readonly SNICallback: SNICallback = (servername, cb) => {
    this.getSecureContext(servername).then(
      (ctx) => cb(null, ctx),
      (err: unknown) => {
        this.onError(`Certificate error for ${servername}: ${errorMessage(err)}`);
        cb(err instanceof Error ? err : new Error(String(err)));
      }
    );
  };

  /**
   * SNI callback for connections that negotiate the acme-tls/1 protocol:
   * presents the pending TLS-ALPN-01 certificate for the hostname.
   */
  readonly challengeSNICallback: SNICallback = (servername, cb) => {
    const hostname = normalizeServername(servername);
    const challenge = this.challenges.tlsAlpn.get(hostname);
    if (!challenge) {
      cb(new ProxyError(`acme: no TLS-ALPN-01 challenge pending for "${hostname}"`));
      return;
    }
    try {
      cb(null, tls.createSecureContext({ cert: challenge.cert, key: challenge.key }));
    } catch (err: unknown) {
      this.onError(`Challenge certificate error for ${hostname}: ${errorMessage(err)}`);
      cb(err instanceof Error ? err : new Error(String(err)));
    }
  };

  /**
   * Answer an HTTP-01 challenge request. Returns false when the request is
   * not a challenge request and was left untouched.
   */
  handleChallenge(req: http.IncomingMessage, res: http.ServerResponse): boolean {
    const url = req.url || "";
    if (!url.startsWith(ACME_CHALLENGE_PREFIX)) return false;

    const token = url.slice(ACME_CHALLENGE_PREFIX.length).split("?")[0];
    const keyAuthorization = this.challenges.http.get(token);
    if (keyAuthorization === undefined) {
      res.writeHead(404, { "Content-Type": "text/plain" });
      res.end("Not Found");
      return true;
    }
    res.writeHead(200, { "Content-Type": "text/plain" });
    res.end(keyAuthorization);
    return true;
  }

  private cachePaths(hostname: string): { certPath: string; keyPath: string } {
    const safeName = sanitizeHostForFilename(hostname);
    return {
      certPath: path.join(this.cacheDir, `${safeName}.pem`),
      keyPath: path.join(this.cacheDir, `${safeName}-key.pem`),
    };
  }

  private async loadOrIssue(hostname: string): Promise<CachedContext> {
    const { certPath, keyPath } = this.cachePaths(hostname);

    if (fileExists(certPath) && fileExists(keyPath)) {
      const [cert, key] = await Promise.all([
        fs.promises.readFile(certPath),
        fs.promises.readFile(keyPath),
      ]);
      const expiresAt = certificateExpiry(cert);
      if (isFresh(expiresAt)) {
        return { ctx: tls.createSecureContext({ cert, key }), expiresAt };
      }
    }

    const issued = await this.issuer.issue(hostname, this.challenges);

    await fs.promises.mkdir(this.cacheDir, { recursive: true, mode: 0o700 });
    await fs.promises.writeFile(certPath, issued.cert, { mode: 0o644 });
    await fs.promises.writeFile(keyPath, issued.key, { mode: 0o600 });
    fixOwnership(certPath, keyPath);

    return {
      ctx: tls.createSecureContext({ cert: issued.cert, key: issued.key }),
      expiresAt: certificateExpiry(issued.cert),
    };
  }
}
