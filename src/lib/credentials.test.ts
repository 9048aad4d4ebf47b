import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { CredentialsError } from "./api/errors.js";
import { maskPassword, parseProperties, resolveCredentials } from "./credentials.js";

describe("maskPassword", () => {
  it("keeps the first and last character", () => {
    expect(maskPassword("test-secret")).toBe("t*********t");
  });

  it("hides short passwords entirely", () => {
    expect(maskPassword("ab")).toBe("***");
    expect(maskPassword("")).toBe("***");
    expect(maskPassword(undefined)).toBe("***");
  });
});

describe("parseProperties", () => {
  it("reads key=value and key: value lines and skips comments", () => {
    const props = parseProperties("# comment\n! also comment\nSYSMLV2_USERNAME = test-user\nSYSMLV2_PASSWORD: test-secret\r\n\n");
    expect(Object.fromEntries(props)).toEqual({
      SYSMLV2_USERNAME: "test-user",
      SYSMLV2_PASSWORD: "test-secret",
    });
  });
});

describe("resolveCredentials", () => {
  let dir: string;
  let missing: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "creds-"));
    missing = join(dir, "none.properties");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("prefers arguments", async () => {
    const creds = await resolveCredentials({
      username: "test-user",
      password: "test-secret",
      env: { SYSMLV2_USERNAME: "env-user", SYSMLV2_PASSWORD: "env-secret" },
    });
    expect(creds).toEqual({ username: "test-user", password: "test-secret", source: "arguments" });
  });

  it("falls back to the environment", async () => {
    const creds = await resolveCredentials({
      env: { SYSMLV2_USERNAME: "env-user", SYSMLV2_PASSWORD: "env-secret" },
      filePath: missing,
    });
    expect(creds.source).toBe("environment");
    expect(creds.username).toBe("env-user");
  });

  it("reads the properties file, including a base URL", async () => {
    const filePath = join(dir, "credentials.properties");
    await writeFile(
      filePath,
      "SYSMLV2_USERNAME=file-user\nSYSMLV2_PASSWORD=test-secret\nSYSMLV2_BASE_URL=https://models.test/api\n"
    );

    const creds = await resolveCredentials({ env: {}, filePath });

    expect(creds).toEqual({
      username: "file-user",
      password: "test-secret",
      source: "file",
      fileBaseUrl: "https://models.test/api",
    });
  });

  it("prompts for whatever is still missing", async () => {
    const prompt = vi.fn(async (question: string) => (question.startsWith("Password") ? "test-secret\n" : "unused"));

    const creds = await resolveCredentials({ username: "test-user", env: {}, filePath: missing, prompt });

    expect(creds).toEqual({ username: "test-user", password: "test-secret", source: "prompt", fileBaseUrl: undefined });
    expect(prompt).toHaveBeenCalledTimes(1);
  });

  it("fails without any source", async () => {
    await expect(resolveCredentials({ env: {}, filePath: missing })).rejects.toBeInstanceOf(CredentialsError);
  });
});
