import { isErrnoException } from "./utils.js";

/** Base class for every error raised by the proxy. */
export class ProxyError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed origin URL, listen address or conflicting flags. */
export class ConfigError extends ProxyError {}

/** Key pair or certificate generation failed. */
export class GenerationError extends ProxyError {}

/** Certificate or key files could not be written or read. */
export class PersistenceError extends ProxyError {}

/** A listener could not bind its address. */
export class ListenError extends ProxyError {
  constructor(
    message: string,
    readonly address: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** The origin could not be reached for a single request. */
export class ForwardError extends ProxyError {}

/** Render an unknown thrown value as a message string. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Wrap a bind failure, translating common errno codes into hints. */
export function toListenError(err: unknown, address: string): ListenError {
  if (isErrnoException(err) && err.code === "EADDRINUSE") {
    return new ListenError(`Address ${address} is already in use.`, address, { cause: err });
  }
  if (isErrnoException(err) && err.code === "EACCES") {
    return new ListenError(
      `Permission denied for ${address}. Ports below 1024 require sudo.`,
      address,
      { cause: err }
    );
  }
  return new ListenError(`Unable to listen on ${address}: ${errorMessage(err)}`, address, {
    cause: err,
  });
}
