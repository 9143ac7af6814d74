import { describe, it, expect } from "vitest";
import { parseRequestUrl } from "./url.js";

describe("parseRequestUrl", () => {
  it("splits host and path with query", () => {
    expect(parseRequestUrl("https://Example.COM:8443/a/b?c=d")).toEqual({
      host: "example.com",
      path: "/a/b?c=d",
    });
  });

  it("falls back to the raw value for unparseable URLs", () => {
    expect(parseRequestUrl("not a url")).toEqual({ host: "", path: "not a url" });
  });
});
