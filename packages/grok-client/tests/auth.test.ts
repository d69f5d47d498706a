import { describe, it, expect } from "vitest";
import { Metadata } from "@grpc/grpc-js";
import {
  assertHeaderSafe,
  bearerAuthInterceptor,
  setBearer,
} from "../src/transport/auth.js";
import { InvalidHeaderError } from "../src/types/errors.js";

describe("setBearer", () => {
  it("writes the authorization header", () => {
    const metadata = new Metadata();
    setBearer(metadata, "test-secret");
    expect(metadata.get("authorization")).toEqual(["Bearer test-secret"]);
  });

  it("replaces an earlier value", () => {
    const metadata = new Metadata();
    metadata.set("authorization", "Bearer old");
    setBearer(metadata, "test-secret");
    expect(metadata.get("authorization")).toEqual(["Bearer test-secret"]);
  });
});

describe("assertHeaderSafe", () => {
  it("accepts printable ASCII", () => {
    expect(() => assertHeaderSafe("xai-test-secret 123")).not.toThrow();
  });

  it.each(["bad\nkey", "ключ", "tab\tkey", ""])("rejects %j", (key) => {
    expect(() => assertHeaderSafe(key)).toThrow(InvalidHeaderError);
  });

  it("does not include the key in the message", () => {
    expect(() => assertHeaderSafe("secret\nvalue")).toThrow(
      "API key contains characters that cannot be sent in an authorization header",
    );
  });
});

describe("bearerAuthInterceptor", () => {
  it("refuses a key it could not send", () => {
    expect(() => bearerAuthInterceptor("bad\nkey")).toThrow(InvalidHeaderError);
  });

  it("returns an interceptor for a valid key", () => {
    expect(typeof bearerAuthInterceptor("test-secret")).toBe("function");
  });
});
