import { readFile } from "node:fs/promises";
import { consola } from "consola";
import { createClientFromConfig, printJson, type CommonOptions } from "@/cli/helpers";
import { getApi } from "@/lib/api";
import type { HttpTransport } from "@/lib/types";

export interface UpsertCommandOptions extends CommonOptions {
  file: string;
}

export async function upsertCommand(apiId: string, name: string, options: UpsertCommandOptions, transport?: HttpTransport): Promise<void> {
  const api = getApi(apiId);
  const body = await readFile(options.file, "utf8");
  const client = await createClientFromConfig(options, transport);
  const entity = await client.upsertByName(api, name, body);

  if (options.json) {
    printJson(entity);
    return;
  }
  consola.success(`[${api.id}] "${entity.name}" synced (${entity.id})`);
}

export async function deleteCommand(apiId: string, name: string, options: CommonOptions, transport?: HttpTransport): Promise<void> {
  const api = getApi(apiId);
  const client = await createClientFromConfig(options, transport);
  await client.deleteByName(api, name);

  if (options.json) {
    printJson({ deleted: name });
    return;
  }
  consola.success(`[${api.id}] "${name}" is absent`);
}
