import { consola } from "consola";
import type { ApiDescriptor, Value } from "@/lib/types";

/**
 * Maps a config name to the remote id currently backing it.
 */
export interface NameResolver {
  resolve(api: ApiDescriptor, name: string): Promise<string | undefined>;
}

/**
 * The config API has no server-side name filter, so resolution lists the
 * whole family and scans it. Names match exactly; the first match in list
 * order wins when the remote holds duplicates.
 */
export class ListScanResolver implements NameResolver {
  private list: (api: ApiDescriptor) => Promise<Value[]>;

  constructor(list: (api: ApiDescriptor) => Promise<Value[]>) {
    this.list = list;
  }

  async resolve(api: ApiDescriptor, name: string): Promise<string | undefined> {
    const values = await this.list(api);
    const match = findByName(values, name);
    consola.debug(`[${api.id}] "${name}" ${match ? `resolved to ${match.id}` : "not found"}`);
    return match?.id;
  }
}

export function findByName(values: Value[], name: string): Value | undefined {
  return values.find((value) => value.name === name);
}
