import { describe, it, expect } from "vitest";
import { firstNonEmpty, loadConfig, resolveBaseUrl } from "../config.js";
import { ConfigurationError } from "../errors.js";

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    const config = loadConfig({});
    expect(config.ragengine).toEqual({ model: "example_model" });
    expect(config.http).toEqual({ connectTimeoutSeconds: 5, timeoutSeconds: 60, retries: 3 });
    expect(config.chunking).toEqual({ maxChars: 3000, overlapChars: 200 });
    expect(config.logLevel).toBe("info");
  });

  it("reads RAG engine settings from the environment", () => {
    const config = loadConfig({
      RAGENGINE_URL: "http://rag.local:8000",
      INGRESS_IP: "10.0.0.5",
      RAGENGINE_MODEL: "phi-3",
      RAGENGINE_API_KEY: "test-secret",
    });
    expect(config.ragengine).toEqual({
      url: "http://rag.local:8000",
      ingressIp: "10.0.0.5",
      model: "phi-3",
      apiKey: "test-secret",
    });
  });

  it("overrides HTTP and chunking settings via env vars", () => {
    const config = loadConfig({
      RAGENGINE_CONNECT_TIMEOUT: "2.5",
      RAGENGINE_TIMEOUT: "30",
      RAGENGINE_RETRIES: "5",
      CHUNK_MAX_CHARS: "1200",
      CHUNK_OVERLAP_CHARS: "0",
      LOG_LEVEL: "debug",
    });
    expect(config.http).toEqual({ connectTimeoutSeconds: 2.5, timeoutSeconds: 30, retries: 5 });
    expect(config.chunking).toEqual({ maxChars: 1200, overlapChars: 0 });
    expect(config.logLevel).toBe("debug");
  });

  it("treats empty variables as unset", () => {
    const config = loadConfig({ RAGENGINE_URL: "", RAGENGINE_RETRIES: "", LOG_LEVEL: "" });
    expect(config.ragengine.url).toBeUndefined();
    expect(config.http.retries).toBe(3);
    expect(config.logLevel).toBe("info");
  });

  it("rejects a non-numeric timeout", () => {
    expect(() => loadConfig({ RAGENGINE_TIMEOUT: "soon" })).toThrow(ConfigurationError);
  });

  it("rejects zero retries", () => {
    expect(() => loadConfig({ RAGENGINE_RETRIES: "0" })).toThrow(/^Invalid environment: http\.retries/);
  });

  it("rejects an unknown log level", () => {
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow(/logLevel/);
  });
});

describe("firstNonEmpty", () => {
  it("skips undefined and blank values and trims the winner", () => {
    expect(firstNonEmpty(undefined, "   ", " b ", "c")).toBe("b");
  });

  it("returns undefined when nothing is set", () => {
    expect(firstNonEmpty(undefined, "")).toBeUndefined();
  });
});

describe("resolveBaseUrl", () => {
  const env = {
    RAGENGINE_URL: "http://from-env:8000",
    INGRESS_IP: "10.0.0.5",
  };

  it("prefers the flag", () => {
    expect(resolveBaseUrl("http://from-flag", loadConfig(env))).toBe("http://from-flag/");
  });

  it("falls back to RAGENGINE_URL", () => {
    expect(resolveBaseUrl(undefined, loadConfig(env))).toBe("http://from-env:8000/");
  });

  it("ignores a blank flag", () => {
    expect(resolveBaseUrl("  ", loadConfig(env))).toBe("http://from-env:8000/");
  });

  it("falls back to http://INGRESS_IP", () => {
    expect(resolveBaseUrl(undefined, loadConfig({ INGRESS_IP: "10.0.0.5" }))).toBe("http://10.0.0.5/");
  });

  it("keeps an existing trailing slash and path", () => {
    expect(resolveBaseUrl("http://gw/rag/", loadConfig({}))).toBe("http://gw/rag/");
  });

  it("fails when no source is set", () => {
    expect(() => resolveBaseUrl(undefined, loadConfig({}))).toThrow(
      "Missing base URL. Provide --base-url or set $RAGENGINE_URL, or set $INGRESS_IP.",
    );
  });

  it("rejects an unparseable URL", () => {
    expect(() => resolveBaseUrl("not a url", loadConfig({}))).toThrow("Invalid base URL: not a url");
  });
});
