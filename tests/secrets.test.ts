import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../src/lib/errors";
import { parseSecretString, SecretCache } from "../src/lib/secrets";
import { silentLogger } from "./support/fakes";

describe("parseSecretString", () => {
  it("reads both secrets", () => {
    expect(parseSecretString(JSON.stringify({ GEMINI_KEY: "test-key", JWT_SECRET: "test-secret" }))).toEqual({
      inferenceApiKey: "test-key",
      signingSecret: "test-secret",
    });
  });

  it("allows an empty inference key", () => {
    expect(parseSecretString(JSON.stringify({ GEMINI_KEY: "", JWT_SECRET: "test-secret" })).inferenceApiKey).toBe("");
  });

  it("rejects a bundle without a signing secret", () => {
    expect(() => parseSecretString(JSON.stringify({ GEMINI_KEY: "test-key" }))).toThrow(
      "Secret bundle is missing GEMINI_KEY or JWT_SECRET.",
    );
  });

  it("rejects a value that is not JSON", () => {
    expect(() => parseSecretString("GEMINI_KEY=test-key")).toThrow(ConfigurationError);
  });
});

describe("SecretCache", () => {
  it("loads once and serves the cached bundle", async () => {
    let loads = 0;
    const cache = new SecretCache(async () => {
      loads++;
      return { inferenceApiKey: "test-key", signingSecret: "test-secret" };
    }, silentLogger);

    const [first, second] = await Promise.all([cache.get(), cache.get()]);
    const third = await cache.get();

    expect(loads).toBe(1);
    expect(first).toBe(second);
    expect(third).toBe(first);
  });

  it("retries after a failed load", async () => {
    let loads = 0;
    const cache = new SecretCache(async () => {
      loads++;
      if (loads === 1) throw new Error("ResourceNotFoundException");
      return { inferenceApiKey: "test-key", signingSecret: "test-secret" };
    }, silentLogger);

    await expect(cache.get()).rejects.toThrow("ResourceNotFoundException");
    await expect(cache.get()).resolves.toEqual({ inferenceApiKey: "test-key", signingSecret: "test-secret" });
    expect(loads).toBe(2);
  });
});
