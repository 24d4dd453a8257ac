import { describe, it, expect } from "vitest";
import { ConfigError, ListenError, ProxyError, errorMessage, toListenError } from "./errors.js";

function errno(code: string, message = code): Error {
  return Object.assign(new Error(message), { code });
}

describe("ProxyError", () => {
  it("names subclasses after themselves and keeps the cause", () => {
    const cause = new Error("root");
    const err = new ConfigError("bad flag", { cause });

    expect(err).toBeInstanceOf(ProxyError);
    expect(err.name).toBe("ConfigError");
    expect(err.cause).toBe(cause);
  });
});

describe("errorMessage", () => {
  it("reads Error messages and stringifies anything else", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage("plain")).toBe("plain");
  });
});

describe("toListenError", () => {
  it("explains an address in use", () => {
    const err = toListenError(errno("EADDRINUSE"), "127.0.0.1:4430");

    expect(err).toBeInstanceOf(ListenError);
    expect(err.message).toBe("Address 127.0.0.1:4430 is already in use.");
    expect(err.address).toBe("127.0.0.1:4430");
  });

  it("explains privileged ports", () => {
    expect(toListenError(errno("EACCES"), ":443").message).toBe(
      "Permission denied for :443. Ports below 1024 require sudo."
    );
  });

  it("passes other failures through", () => {
    expect(toListenError(errno("EADDRNOTAVAIL", "listen EADDRNOTAVAIL"), "10.9.9.9:443").message).toBe(
      "Unable to listen on 10.9.9.9:443: listen EADDRNOTAVAIL"
    );
  });
});
