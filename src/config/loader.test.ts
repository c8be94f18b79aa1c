import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadConfig, parseConfig, resolveConfigPath } from "@/config/loader";
import { ConfigError } from "@/lib/errors";

describe("parseConfig", () => {
  it("accepts JSONC with comments and trailing commas and fills defaults", () => {
    const text = `{
      // tenant
      "environmentUrl": "https://env.example.com",
      "token": "test-token",
    }`;

    expect(parseConfig(text, "inline")).toEqual({
      environmentUrl: "https://env.example.com",
      token: "test-token",
      timeoutMs: 30_000,
      retries: 0,
    });
  });

  it("reads the token from the named environment variable", () => {
    const text = '{"environmentUrl":"https://env.example.com","tokenEnv":"SYNC_TOKEN","retries":2}';

    expect(parseConfig(text, "inline", { SYNC_TOKEN: "test-secret" })).toMatchObject({
      token: "test-secret",
      retries: 2,
    });
  });

  it("fails when the token variable is unset", () => {
    const text = '{"environmentUrl":"https://env.example.com","tokenEnv":"SYNC_TOKEN"}';

    expect(() => parseConfig(text, "inline", {})).toThrow(
      "Environment variable SYNC_TOKEN holding the API token is not set",
    );
  });

  it("requires exactly one token source", () => {
    const both = '{"environmentUrl":"https://env.example.com","token":"a","tokenEnv":"B"}';
    const none = '{"environmentUrl":"https://env.example.com"}';

    expect(() => parseConfig(both, "inline", {})).toThrow(
      "Config validation failed:\ntoken: exactly one of token or tokenEnv is required",
    );
    expect(() => parseConfig(none, "inline", {})).toThrow(ConfigError);
  });

  it("reports invalid fields by path", () => {
    const text = '{"environmentUrl":"not a url","token":"test-token","timeoutMs":-1}';

    const error = (() => {
      try {
        parseConfig(text, "inline", {});
      } catch (e) {
        return e;
      }
      return undefined;
    })();

    expect(error).toBeInstanceOf(ConfigError);
    expect(error instanceof Error ? error.message.split("\n").map((line) => line.split(":")[0]) : []).toEqual([
      "Config validation failed",
      "environmentUrl",
      "timeoutMs",
    ]);
  });

  it("rejects broken JSONC", () => {
    expect(() => parseConfig('{"environmentUrl": ', "broken.jsonc", {})).toThrow(/^Invalid JSONC in broken\.jsonc/);
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "config-sync-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("loads an explicit config file", async () => {
    const path = join(dir, "env.jsonc");
    await writeFile(path, '{"environmentUrl":"https://env.example.com","token":"test-token","timeoutMs":5000}');

    await expect(loadConfig(path, {})).resolves.toEqual({
      environmentUrl: "https://env.example.com",
      token: "test-token",
      timeoutMs: 5000,
      retries: 0,
    });
  });

  it("fails for a missing file", async () => {
    await expect(loadConfig(join(dir, "missing.json"), {})).rejects.toBeInstanceOf(ConfigError);
  });

  it("keeps an explicit path as given", async () => {
    await expect(resolveConfigPath("./custom.jsonc")).resolves.toBe("./custom.jsonc");
  });
});
