import { describe, it, expect, vi } from "vitest";
import * as path from "node:path";
import {
  DEFAULT_ALT_NAMES,
  DEFAULT_LISTEN_ADDRESS,
  DEFAULT_ORIGIN,
  LETSENCRYPT_DIRECTORY_URL,
  USER_STATE_DIR,
  buildConfig,
  challengePriority,
  defaultFlags,
  normalizeOrigin,
  parseAltNames,
  parseDomain,
  parseFlags,
  parseForwardTarget,
  parseListenAddress,
  parsePort,
  resolveStateDir,
} from "./config.js";
import { ConfigError } from "./errors.js";

describe("parseFlags", () => {
  it("returns defaults for no arguments", () => {
    expect(parseFlags([])).toEqual({
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
    });
  });

  it("accepts -flag value, -flag=value and double-dash forms", () => {
    const flags = parseFlags([
      "-to",
      "http://127.0.0.1:9000",
      "--from=0.0.0.0:443",
      "-cert=cert.pem",
      "--key",
      "key.pem",
      "-altnames",
      "localhost,dev.test",
    ]);

    expect(flags.to).toBe("http://127.0.0.1:9000");
    expect(flags.from).toBe("0.0.0.0:443");
    expect(flags.cert).toBe("cert.pem");
    expect(flags.key).toBe("key.pem");
    expect(flags.altnames).toBe("localhost,dev.test");
  });

  it("treats a bare -redirectHTTP as port 80", () => {
    expect(parseFlags(["-redirectHTTP"]).redirectHTTP).toBe(80);
    expect(parseFlags(["-redirectHTTP", "-domain", "example.com"]).redirectHTTP).toBe(80);
    expect(parseFlags(["-redirectHTTP=true"]).redirectHTTP).toBe(80);
    expect(parseFlags(["-redirectHTTP=false"]).redirectHTTP).toBe(0);
  });

  it("takes an explicit -redirectHTTP port", () => {
    expect(parseFlags(["-redirectHTTP", "8080"]).redirectHTTP).toBe(8080);
    expect(parseFlags(["--redirectHTTP=8081"]).redirectHTTP).toBe(8081);
  });

  it("recognizes help and version", () => {
    expect(parseFlags(["-h"]).help).toBe(true);
    expect(parseFlags(["--help"]).help).toBe(true);
    expect(parseFlags(["-version"]).version).toBe(true);
  });

  it("rejects unknown flags, missing values and positional arguments", () => {
    expect(() => parseFlags(["-bogus", "1"])).toThrow("flag provided but not defined: -bogus");
    expect(() => parseFlags(["-to"])).toThrow("flag needs an argument: -to");
    expect(() => parseFlags(["extra"])).toThrow("unexpected argument: extra");
    expect(() => parseFlags(["-redirectHTTP=abc"])).toThrow(ConfigError);
  });
});

describe("parsePort", () => {
  it("accepts 0 through 65535", () => {
    expect(parsePort("0", "-from")).toBe(0);
    expect(parsePort("65535", "-from")).toBe(65535);
  });

  it("rejects out-of-range and non-numeric values", () => {
    expect(() => parsePort("65536", "-from")).toThrow(
      'invalid value "65536" for flag -from: must be between 0 and 65535'
    );
    expect(() => parsePort("-1", "-from")).toThrow(
      'invalid value "-1" for flag -from: must be a port number'
    );
  });
});

describe("normalizeOrigin", () => {
  it("keeps explicit schemes", () => {
    expect(normalizeOrigin("https://api.test")).toEqual({
      url: "https://api.test",
      assumedHttp: false,
    });
  });

  it("assumes http:// when no scheme is given", () => {
    expect(normalizeOrigin("127.0.0.1:9000")).toEqual({
      url: "http://127.0.0.1:9000",
      assumedHttp: true,
    });
  });
});

describe("parseForwardTarget", () => {
  it("parses host, port and empty base path", () => {
    expect(parseForwardTarget("http://127.0.0.1:9000")).toEqual({
      href: "http://127.0.0.1:9000/",
      protocol: "http:",
      hostname: "127.0.0.1",
      port: 9000,
      host: "127.0.0.1:9000",
      basePath: "",
    });
  });

  it("defaults the port from the scheme", () => {
    expect(parseForwardTarget("http://backend.test").port).toBe(80);
    expect(parseForwardTarget("https://backend.test").port).toBe(443);
  });

  it("keeps a path prefix without its trailing slash", () => {
    expect(parseForwardTarget("http://127.0.0.1:9000/api/").basePath).toBe("/api");
  });

  it("unbrackets IPv6 hostnames", () => {
    const target = parseForwardTarget("http://[::1]:9000");
    expect(target.hostname).toBe("::1");
    expect(target.host).toBe("[::1]:9000");
  });

  it("rejects unparsable URLs", () => {
    expect(() => parseForwardTarget("http://exa mple.com")).toThrow(
      "Unable to parse 'to' url: http://exa mple.com"
    );
  });
});

describe("parseListenAddress", () => {
  it("splits host and port", () => {
    expect(parseListenAddress("127.0.0.1:4430")).toEqual({ host: "127.0.0.1", port: 4430 });
    expect(parseListenAddress("[::1]:443")).toEqual({ host: "::1", port: 443 });
  });

  it("treats an empty host as all interfaces", () => {
    expect(parseListenAddress(":443")).toEqual({ host: undefined, port: 443 });
  });

  it("rejects addresses without a port", () => {
    expect(() => parseListenAddress("localhost")).toThrow(
      'Invalid listen address "localhost": expected host:port'
    );
  });
});

describe("parseAltNames", () => {
  it("splits, trims and de-duplicates while keeping order", () => {
    expect(parseAltNames(" localhost, example.com,localhost,,127.0.0.1 ")).toEqual([
      "localhost",
      "example.com",
      "127.0.0.1",
    ]);
  });
});

describe("parseDomain", () => {
  it("lowercases bare hostnames", () => {
    expect(parseDomain("Example.COM")).toBe("example.com");
  });

  it("returns null for an empty value", () => {
    expect(parseDomain("  ")).toBeNull();
  });

  it("rejects schemes, ports and paths", () => {
    expect(() => parseDomain("https://example.com")).toThrow(ConfigError);
    expect(() => parseDomain("example.com:443")).toThrow(ConfigError);
    expect(() => parseDomain("example.com/app")).toThrow(ConfigError);
  });
});

describe("challengePriority", () => {
  it("prefers HTTP-01 when the redirect listener is on port 80", () => {
    expect(challengePriority(80)).toEqual(["http-01", "tls-alpn-01"]);
  });

  it("prefers TLS-ALPN-01 otherwise", () => {
    expect(challengePriority(0)).toEqual(["tls-alpn-01", "http-01"]);
    expect(challengePriority(8080)).toEqual(["tls-alpn-01", "http-01"]);
  });
});

describe("resolveStateDir", () => {
  it("uses SSL_PROXY_DIR when set", () => {
    expect(resolveStateDir({ SSL_PROXY_DIR: "/tmp/state" })).toBe("/tmp/state");
  });

  it("falls back to the per-user directory", () => {
    expect(resolveStateDir({})).toBe(USER_STATE_DIR);
  });
});

describe("buildConfig", () => {
  const cwd = "/work";
  const env = { SSL_PROXY_DIR: "/state" };

  it("applies defaults", () => {
    const config = buildConfig(defaultFlags(), { env, cwd });

    expect(config.origin.href).toBe("http://127.0.0.1/");
    expect(config.origin.port).toBe(80);
    expect(config.listenAddress).toBe("127.0.0.1:4430");
    expect(config.certPath).toBeNull();
    expect(config.keyPath).toBeNull();
    expect(config.domain).toBeNull();
    expect(config.redirectPort).toBe(0);
    expect(config.altNames).toEqual(["localhost"]);
    expect(config.defaultCertPath).toBe(path.join("/state", "cert.pem"));
    expect(config.defaultKeyPath).toBe(path.join("/state", "key.pem"));
    expect(config.acme).toEqual({
      cacheDir: path.resolve(cwd, "certs"),
      directoryUrl: LETSENCRYPT_DIRECTORY_URL,
      email: null,
      challengePriority: ["tls-alpn-01", "http-01"],
    });
  });

  it("is frozen", () => {
    const config = buildConfig(defaultFlags(), { env, cwd });

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.origin)).toBe(true);
    expect(Object.isFrozen(config.altNames)).toBe(true);
  });

  it("resolves cert and key against the working directory", () => {
    const config = buildConfig(
      { ...defaultFlags(), cert: "tls/cert.pem", key: "/abs/key.pem" },
      { env, cwd }
    );

    expect(config.certPath).toBe(path.resolve(cwd, "tls/cert.pem"));
    expect(config.keyPath).toBe("/abs/key.pem");
  });

  it("logs when http:// is assumed for the origin", () => {
    const logger = { info: vi.fn(), success: vi.fn(), warn: vi.fn(), error: vi.fn() };

    buildConfig({ ...defaultFlags(), to: "127.0.0.1:9000" }, { env, cwd, logger });

    expect(logger.info).toHaveBeenCalledWith("Assuming -to URL is using http://");
  });

  it("rejects -cert without -key", () => {
    expect(() => buildConfig({ ...defaultFlags(), cert: "cert.pem" }, { env, cwd })).toThrow(
      "-cert and -key must be used together"
    );
  });

  it("allows a lone -cert when a domain overrides it", () => {
    const config = buildConfig(
      { ...defaultFlags(), cert: "cert.pem", domain: "example.com" },
      { env, cwd }
    );

    expect(config.domain).toBe("example.com");
  });

  it("rejects an empty SAN list", () => {
    expect(() => buildConfig({ ...defaultFlags(), altnames: " , " }, { env, cwd })).toThrow(
      "-altnames must list at least one name"
    );
  });

  it("reads the ACME directory and contact from flags and env", () => {
    const config = buildConfig(
      { ...defaultFlags(), domain: "example.com", email: "ops@example.com" },
      { env: { ...env, SSL_PROXY_ACME_DIRECTORY: "https://acme.test/directory" }, cwd }
    );

    expect(config.acme.directoryUrl).toBe("https://acme.test/directory");
    expect(config.acme.email).toBe("ops@example.com");
  });

  it("rejects a malformed listen address", () => {
    expect(() => buildConfig({ ...defaultFlags(), from: "4430" }, { env, cwd })).toThrow(
      ConfigError
    );
  });
});
