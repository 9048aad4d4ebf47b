/**
 * Credential lookup. Sources, first complete pair wins:
 * command-line arguments, SYSMLV2_USERNAME/SYSMLV2_PASSWORD, credentials.properties,
 * then an interactive prompt when stdin is a terminal.
 */

import { readFile } from "node:fs/promises";
import { createInterface } from "node:readline/promises";
import { CredentialsError } from "./api/errors.js";
import { BASE_URL_ENV } from "./config.js";

export const CREDENTIALS_FILE = "credentials.properties";
export const USERNAME_ENV = "SYSMLV2_USERNAME";
export const PASSWORD_ENV = "SYSMLV2_PASSWORD";

export type CredentialSource = "arguments" | "environment" | "file" | "prompt";

export interface Credentials {
  username: string;
  password: string;
  source: CredentialSource;
  /** Base URL named in credentials.properties, if any. */
  fileBaseUrl?: string;
}

export type PromptFn = (question: string) => Promise<string>;

export interface ResolveCredentialsOptions {
  username?: string;
  password?: string;
  env?: NodeJS.ProcessEnv;
  filePath?: string;
  /** Omit to never prompt. */
  prompt?: PromptFn;
}

/**
 * "a1b2c3" -> "a****3". Two characters or fewer give "***".
 */
export function maskPassword(password: string | undefined): string {
  if (!password || password.length <= 2) return "***";
  return password[0] + "*".repeat(password.length - 2) + password[password.length - 1];
}

/**
 * Minimal `.properties` reader: `key=value` or `key: value`, `#` and `!` comments.
 */
export function parseProperties(text: string): Map<string, string> {
  const props = new Map<string, string>();
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || line.startsWith("#") || line.startsWith("!")) continue;
    const match = /^([^=:\s]+)\s*[=:]\s*(.*)$/.exec(line);
    if (match) props.set(match[1], match[2]);
  }
  return props;
}

async function readProperties(path: string): Promise<Map<string, string> | undefined> {
  try {
    return parseProperties(await readFile(path, "utf-8"));
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return undefined;
    throw new CredentialsError(`Cannot read ${path}`, { cause: error });
  }
}

export async function resolveCredentials(options: ResolveCredentialsOptions = {}): Promise<Credentials> {
  let { username, password } = options;
  if (username && password) return { username, password, source: "arguments" };

  const env = options.env ?? {};
  const envUser = env[USERNAME_ENV];
  const envPass = env[PASSWORD_ENV];
  if (envUser && envPass) return { username: envUser, password: envPass, source: "environment" };

  const props = await readProperties(options.filePath ?? CREDENTIALS_FILE);
  const fileBaseUrl = props?.get(BASE_URL_ENV) || undefined;
  if (props) {
    username ||= props.get(USERNAME_ENV);
    password ||= props.get(PASSWORD_ENV);
    if (username && password) return { username, password, source: "file", fileBaseUrl };
  }

  if (options.prompt) {
    username ||= (await options.prompt("Username: ")).trim();
    password ||= (await options.prompt("Password (input visible): ")).trim();
    if (username && password) return { username, password, source: "prompt", fileBaseUrl };
  }

  throw new CredentialsError(
    `Could not obtain credentials. Pass them as arguments, set ${USERNAME_ENV} and ${PASSWORD_ENV}, or create ${CREDENTIALS_FILE}.`
  );
}

/**
 * Prompt on the terminal, or undefined when stdin is not interactive.
 */
export function terminalPrompt(): PromptFn | undefined {
  if (!process.stdin.isTTY) return undefined;
  return async (question) => {
    const rl = createInterface({ input: process.stdin, output: process.stdout });
    try {
      return await rl.question(question);
    } finally {
      rl.close();
    }
  };
}
