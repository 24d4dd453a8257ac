import * as fs from "node:fs";
import * as path from "node:path";
import { createAcmeManager, type AcmeManager } from "./acme.js";
import { ConfigError, PersistenceError, errorMessage } from "./errors.js";
import { formatFingerprint, generateKeys } from "./keygen.js";
import { createConsoleLogger } from "./logger.js";
import type {
  AcmeSettings,
  CertificateMaterial,
  Logger,
  ProxyConfig,
  ProxyTlsOptions,
  TlsSource,
} from "./types.js";
import { fileExists, fixOwnership } from "./utils.js";

/** How long generated self-signed certificates are valid (1 year). */
export const SELF_SIGNED_VALIDITY_MS = 365 * 24 * 60 * 60 * 1000;

export type SelfSignedSource = Extract<TlsSource, { kind: "self-signed" }>;

export interface ResolveTlsSourceOptions {
  logger?: Logger;
  /** Key generator used for self-signed certificates. */
  generate?: (validityMs: number, subjectNames: readonly string[]) => CertificateMaterial;
  /** Factory for the ACME manager used when a domain is configured. */
  createAcmeManager?: (domain: string, settings: Readonly<AcmeSettings>, logger: Logger) => AcmeManager;
}

function defaultAcmeManager(
  domain: string,
  settings: Readonly<AcmeSettings>,
  logger: Logger
): AcmeManager {
  return createAcmeManager({
    domain,
    cacheDir: settings.cacheDir,
    directoryUrl: settings.directoryUrl,
    email: settings.email,
    challengePriority: settings.challengePriority,
    onError: (msg) => logger.error(msg),
  });
}

/**
 * Decide where the HTTPS listener gets its certificates from.
 *
 * 1. A configured domain always selects ACME, even when cert/key are set.
 * 2. An explicit cert/key pair is used as-is.
 * 3. Otherwise the default cert/key files are reused, or generated when
 *    either one is missing.
 */
export function resolveTlsSource(
  config: ProxyConfig,
  options: ResolveTlsSourceOptions = {}
): TlsSource {
  const {
    logger = createConsoleLogger(),
    generate = generateKeys,
    createAcmeManager: makeAcmeManager = defaultAcmeManager,
  } = options;

  if (config.domain) {
    return {
      kind: "acme",
      domain: config.domain,
      manager: makeAcmeManager(config.domain, config.acme, logger),
    };
  }

  if (config.certPath && config.keyPath) {
    const certPath = path.resolve(config.certPath);
    const keyPath = path.resolve(config.keyPath);
    for (const p of [certPath, keyPath]) {
      if (!fileExists(p)) {
        throw new ConfigError(`Cannot read ${p}: file does not exist or is not readable`);
      }
    }
    return { kind: "explicit-files", certPath, keyPath };
  }

  return ensureSelfSignedCerts(config.defaultCertPath, config.defaultKeyPath, config.altNames, {
    logger,
    generate,
  });
}

/**
 * Reuse the cert/key pair at the given paths, or generate a new self-signed
 * pair when either file is missing. Both files are always written together
 * so a stale key never ends up next to a new certificate.
 */
export function ensureSelfSignedCerts(
  certPath: string,
  keyPath: string,
  altNames: readonly string[],
  options: Pick<ResolveTlsSourceOptions, "logger" | "generate"> = {}
): SelfSignedSource {
  const { logger = createConsoleLogger(), generate = generateKeys } = options;

  if (fileExists(certPath) && fileExists(keyPath)) {
    logger.info("Found default cert/key files: using...");
    return { kind: "self-signed", certPath, keyPath, generated: false };
  }

  logger.info(
    `No existing cert or key specified, generating some self-signed certs for use (${certPath}, ${keyPath})`
  );
  const material = generate(SELF_SIGNED_VALIDITY_MS, altNames);
  writeCertificateFiles(certPath, keyPath, material);
  logger.info(`SHA256 Fingerprint: ${formatFingerprint(material.fingerprint)}`);

  return { kind: "self-signed", certPath, keyPath, generated: true };
}

/**
 * Persist a generated pair. The key is owner-only (0600); parent
 * directories are created owner-only when missing.
 */
export function writeCertificateFiles(
  certPath: string,
  keyPath: string,
  material: CertificateMaterial
): void {
  try {
    for (const dir of new Set([path.dirname(certPath), path.dirname(keyPath)])) {
      fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
    }
    fs.writeFileSync(keyPath, material.key, { mode: 0o600 });
    fs.chmodSync(keyPath, 0o600);
    fs.writeFileSync(certPath, material.cert, { mode: 0o644 });
    fs.chmodSync(certPath, 0o644);
  } catch (err: unknown) {
    throw new PersistenceError(`Unable to create the cert or key file: ${errorMessage(err)}`, {
      cause: err,
    });
  }
  fixOwnership(certPath, keyPath);
}

/** Turn a resolved source into the options the HTTPS listener is created with. */
export function loadTlsOptions(source: TlsSource): ProxyTlsOptions {
  if (source.kind === "acme") {
    return {
      SNICallback: source.manager.SNICallback,
      challengeSNICallback: source.manager.challengeSNICallback,
    };
  }
  try {
    return {
      cert: fs.readFileSync(source.certPath),
      key: fs.readFileSync(source.keyPath),
    };
  } catch (err: unknown) {
    throw new PersistenceError(`Error reading certificate files: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}
