import { describe, expect, it } from "vitest";
import { resolveClientIdentity } from "@utils/client_identity.ts";

describe("resolveClientIdentity", () => {
  it("prefers the API key", () => {
    expect(resolveClientIdentity({ apiKey: "test-key", remoteAddress: "10.1.1.1" })).toBe("api_key:test-key");
  });

  it("uses the first forwarded address", () => {
    expect(resolveClientIdentity({
      headers: { "X-Forwarded-For": "203.0.113.7, 10.0.0.1" },
      remoteAddress: "10.0.0.1",
    })).toBe("ip:203.0.113.7");
  });

  it("falls back to the real IP header", () => {
    expect(resolveClientIdentity({ headers: { "x-real-ip": " 198.51.100.4 " } })).toBe("ip:198.51.100.4");
  });

  it("falls back to the socket address", () => {
    expect(resolveClientIdentity({ headers: {}, remoteAddress: "192.0.2.1" })).toBe("ip:192.0.2.1");
    expect(resolveClientIdentity({})).toBe("ip:unknown");
  });
});
