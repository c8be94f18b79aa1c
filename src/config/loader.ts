import { access, readFile } from "node:fs/promises";
import { parse, printParseErrorCode, type ParseError } from "jsonc-parser";
import { ZodError } from "zod/v4";
import { ConfigSchema, type AppConfig, type RuntimeConfig } from "@/config/schema";
import { ConfigError, errorMessage } from "@/lib/errors";

export const DEFAULT_CONFIG_PATHS = ["./sync.config.jsonc", "./sync.config.json"] as const;

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export async function resolveConfigPath(explicitPath?: string): Promise<string> {
  if (explicitPath) return explicitPath;
  for (const candidate of DEFAULT_CONFIG_PATHS) {
    if (await fileExists(candidate)) return candidate;
  }
  throw new ConfigError(`No config file found (tried ${DEFAULT_CONFIG_PATHS.join(", ")})`);
}

function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "root";
      return `${path}: ${issue.message}`;
    })
    .join("\n");
}

export function resolveToken(config: AppConfig, env: NodeJS.ProcessEnv): string {
  if (config.token !== undefined) return config.token;
  const value = config.tokenEnv ? env[config.tokenEnv]?.trim() : undefined;
  if (!value) {
    throw new ConfigError(`Environment variable ${config.tokenEnv ?? "(none)"} holding the API token is not set`);
  }
  return value;
}

export function parseConfig(rawText: string, source: string, env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const errors: ParseError[] = [];
  const parsedRaw: unknown = parse(rawText, errors, { allowTrailingComma: true });
  if (errors.length > 0) {
    const details = errors.map((error) => `${printParseErrorCode(error.error)} at offset ${error.offset}`).join(", ");
    throw new ConfigError(`Invalid JSONC in ${source}: ${details}`);
  }

  const parsed = ConfigSchema.safeParse(parsedRaw);
  if (!parsed.success) {
    throw new ConfigError(`Config validation failed:\n${formatZodError(parsed.error)}`);
  }

  return {
    environmentUrl: parsed.data.environmentUrl,
    token: resolveToken(parsed.data, env),
    timeoutMs: parsed.data.timeoutMs,
    retries: parsed.data.retries,
  };
}

export async function loadConfig(path?: string, env: NodeJS.ProcessEnv = process.env): Promise<RuntimeConfig> {
  const resolvedPath = await resolveConfigPath(path);

  let rawText: string;
  try {
    rawText = await readFile(resolvedPath, "utf8");
  } catch (error) {
    throw new ConfigError(`Config file not found: ${resolvedPath} (${errorMessage(error)})`, { cause: error });
  }

  return parseConfig(rawText, resolvedPath, env);
}
