import { consola, LogLevels } from "consola";
import { ConfigClient } from "@/clients/config-client";
import { loadConfig } from "@/config/loader";
import { createHttpTransport } from "@/lib/http";
import type { HttpTransport } from "@/lib/types";

export interface CommonOptions {
  config?: string;
  json?: boolean;
  verbose?: boolean;
}

export function applyVerbosity(options: CommonOptions): void {
  if (options.verbose) {
    consola.level = LogLevels.debug;
  }
}

export async function createClientFromConfig(
  options: CommonOptions,
  transport?: HttpTransport,
): Promise<ConfigClient> {
  applyVerbosity(options);
  const config = await loadConfig(options.config);
  return new ConfigClient({
    environmentUrl: config.environmentUrl,
    token: config.token,
    transport: transport ?? createHttpTransport({ timeoutMs: config.timeoutMs, retries: config.retries }),
  });
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}
