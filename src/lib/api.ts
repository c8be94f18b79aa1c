import { API_CATALOG, EXTENSION_API_ID } from "@/lib/constants";
import { UnknownApiError } from "@/lib/errors";
import type { ApiDescriptor, ApiFamily } from "@/lib/types";
import { trimTrailingSlash } from "@/lib/utils";

export function createApi(id: string, urlPath: string, family?: ApiFamily): ApiDescriptor {
  const path = urlPath.startsWith("/") ? urlPath : `/${urlPath}`;
  return {
    id,
    urlPath: path,
    family: family ?? (id === EXTENSION_API_ID ? "extension" : "standard"),
    getUrl: (environmentUrl) => `${trimTrailingSlash(environmentUrl)}${path}`,
  };
}

const catalog = new Map<string, ApiDescriptor>(
  API_CATALOG.map((entry) => [entry.id, createApi(entry.id, entry.urlPath, entry.family)]),
);

export function listApis(): ApiDescriptor[] {
  return [...catalog.values()];
}

export function getApi(id: string): ApiDescriptor {
  const api = catalog.get(id);
  if (!api) {
    throw new UnknownApiError(id, [...catalog.keys()]);
  }
  return api;
}
