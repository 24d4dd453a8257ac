export { AcmeClientIssuer, AcmeManager, createAcmeManager } from "./acme.js";
export type {
  CertificateIssuer,
  ChallengeCertificate,
  ChallengeStore,
  ChallengeType,
  IssuedCertificate,
} from "./acme.js";
export {
  ensureSelfSignedCerts,
  loadTlsOptions,
  resolveTlsSource,
  writeCertificateFiles,
} from "./certs.js";
export {
  buildConfig,
  challengePriority,
  parseFlags,
  parseForwardTarget,
  parseListenAddress,
} from "./config.js";
export {
  ConfigError,
  ForwardError,
  GenerationError,
  ListenError,
  PersistenceError,
  ProxyError,
} from "./errors.js";
export { formatFingerprint, generateKeys } from "./keygen.js";
export { createConsoleLogger } from "./logger.js";
export { createForwarder, createProxyServer, createUpgradeForwarder } from "./proxy.js";
export type { ProxyServer } from "./proxy.js";
export { createRedirectHostResolver, listenAddressToHost, startRedirectServer } from "./redirect.js";
export { acmeWarnings, startServer } from "./server.js";
export type { RunningProxy } from "./server.js";
export type {
  CertificateMaterial,
  ForwardTarget,
  Logger,
  ProxyConfig,
  TlsSource,
} from "./types.js";
