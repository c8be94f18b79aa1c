import { consola } from "consola";
import { createClientFromConfig, printJson, type CommonOptions } from "@/cli/helpers";
import { getApi, listApis } from "@/lib/api";
import type { HttpTransport } from "@/lib/types";

export function apisCommand(options: Pick<CommonOptions, "json">): void {
  const apis = listApis().map(({ id, family, urlPath }) => ({ id, family, urlPath }));
  if (options.json) {
    printJson(apis);
    return;
  }
  for (const api of apis) {
    consola.log(`${api.id.padEnd(34)} ${api.family.padEnd(10)} ${api.urlPath}`);
  }
}

export async function listCommand(apiId: string, options: CommonOptions, transport?: HttpTransport): Promise<void> {
  const api = getApi(apiId);
  const client = await createClientFromConfig(options, transport);
  const values = await client.list(api);

  if (options.json) {
    printJson(values);
    return;
  }
  consola.info(`${api.id}: ${values.length} configs`);
  for (const value of values) {
    consola.log(`${value.id}\t${value.name}`);
  }
}

export async function existsCommand(apiId: string, name: string, options: CommonOptions, transport?: HttpTransport): Promise<void> {
  const api = getApi(apiId);
  const client = await createClientFromConfig(options, transport);
  const result = await client.existsByName(api, name);

  if (options.json) {
    printJson(result);
  } else if (result.exists) {
    consola.success(`[${api.id}] "${name}" exists (${result.id})`);
  } else {
    consola.warn(`[${api.id}] "${name}" does not exist`);
  }

  if (!result.exists) {
    process.exitCode = 1;
  }
}

export interface GetCommandOptions extends CommonOptions {
  id?: string;
}

export async function getCommand(apiId: string, name: string | undefined, options: GetCommandOptions, transport?: HttpTransport): Promise<void> {
  const api = getApi(apiId);
  const id = options.id;
  if (id === undefined && name === undefined) {
    throw new Error("Either a config name or --id <id> is required");
  }
  const client = await createClientFromConfig(options, transport);
  if (id !== undefined) {
    console.log(await client.readById(api, id));
  } else if (name !== undefined) {
    console.log(await client.readByName(api, name));
  }
}
