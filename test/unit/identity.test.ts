import { describe, it, expect } from "vitest";
import { resolveIdentity } from "../../src/gateway/identity.js";

describe("resolveIdentity", () => {
  it("uses the first forwarded hop when trusted", () => {
    expect(
      resolveIdentity({
        remoteAddress: "127.0.0.1",
        forwardedFor: " 203.0.113.7 , 10.0.0.2",
        trustForwardedFor: true,
      }),
    ).toBe("203.0.113.7");
  });

  it("ignores the header when not trusted", () => {
    expect(
      resolveIdentity({
        remoteAddress: "127.0.0.1",
        forwardedFor: "203.0.113.7",
        trustForwardedFor: false,
      }),
    ).toBe("127.0.0.1");
  });

  it("falls back to the socket address for an empty header", () => {
    expect(
      resolveIdentity({
        remoteAddress: "127.0.0.1",
        forwardedFor: " , 10.0.0.2",
        trustForwardedFor: true,
      }),
    ).toBe("127.0.0.1");
  });

  it("returns an empty string when nothing is known", () => {
    expect(resolveIdentity({ trustForwardedFor: true })).toBe("");
  });
});
