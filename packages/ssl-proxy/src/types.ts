import type * as tls from "node:tls";
import type { AcmeManager, ChallengeType } from "./acme.js";
import type { ForwardError } from "./errors.js";

/** Parsed origin that every request is forwarded to. */
export interface ForwardTarget {
  /** Normalized origin URL, e.g. "http://127.0.0.1:9000/". */
  href: string;
  protocol: "http:" | "https:";
  hostname: string;
  port: number;
  /** Value written to the outbound Host header ("127.0.0.1:9000"). */
  host: string;
  /** Path prefix joined in front of every request path ("" for none). */
  basePath: string;
}

/** ACME settings used when a public domain is configured. */
export interface AcmeSettings {
  /** Directory where issued certificates and the account key are cached. */
  cacheDir: string;
  /** ACME directory URL (Let's Encrypt production by default). */
  directoryUrl: string;
  /** Optional contact address registered with the ACME account. */
  email: string | null;
  /** Validation methods to attempt, most preferred first. */
  challengePriority: readonly ChallengeType[];
}

/**
 * Startup configuration. Built once by `buildConfig` and frozen; every
 * component receives the same instance.
 */
export interface ProxyConfig {
  readonly origin: ForwardTarget;
  /** TLS listen address in host:port form. */
  readonly listenAddress: string;
  readonly certPath: string | null;
  readonly keyPath: string | null;
  /** When set, ACME-managed certificates are used and cert/key are ignored. */
  readonly domain: string | null;
  /** Plaintext redirect listener port (0 = disabled). */
  readonly redirectPort: number;
  /** Subject alternative names for self-signed generation, in order. */
  readonly altNames: readonly string[];
  readonly defaultCertPath: string;
  readonly defaultKeyPath: string;
  readonly acme: Readonly<AcmeSettings>;
}

/** Self-signed certificate, private key and SHA-256 fingerprint of the certificate. */
export interface CertificateMaterial {
  cert: Buffer;
  key: Buffer;
  fingerprint: Buffer;
}

/**
 * Where the HTTPS listener gets its certificates from. Resolved once at
 * startup by `resolveTlsSource`.
 */
export type TlsSource =
  | { kind: "explicit-files"; certPath: string; keyPath: string }
  | { kind: "self-signed"; certPath: string; keyPath: string; generated: boolean }
  | { kind: "acme"; domain: string; manager: AcmeManager };

export type SNICallback = (
  servername: string,
  cb: (err: Error | null, ctx?: tls.SecureContext) => void
) => void;

/** TLS material handed to the HTTPS listener. */
export interface ProxyTlsOptions {
  cert?: Buffer;
  key?: Buffer;
  /** SNI callback for per-hostname certificate selection. */
  SNICallback?: SNICallback;
  /** Certificate selection for TLS-ALPN-01 validation connections (ALPN acme-tls/1). */
  challengeSNICallback?: SNICallback;
}

export interface ProxyServerOptions {
  /** Origin every request is forwarded to. */
  target: ForwardTarget;
  tls: ProxyTlsOptions;
  /** Called for each request the origin could not serve; defaults to console.error. */
  onError?: (error: ForwardError) => void;
}

export interface Logger {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}
