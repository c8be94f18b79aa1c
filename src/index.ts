/**
 * dt-config-sync - name-addressed upserts against a monitoring platform's config API
 */

export { ConfigClient } from "@/clients/config-client";
export type { ConfigClientOptions } from "@/clients/config-client";
export { ListScanResolver, findByName } from "@/core/resolve";
export type { NameResolver } from "@/core/resolve";
export { selectStrategy, standardJsonUpsert } from "@/core/upsert";
export { extensionUpload } from "@/core/extension";
export type { UpsertContext, UpsertStrategy } from "@/core/types";
export { createApi, getApi, listApis } from "@/lib/api";
export { createHttpTransport } from "@/lib/http";
export type { HttpTransportOptions } from "@/lib/http";
export { loadConfig } from "@/config/loader";
export type { RuntimeConfig } from "@/config/schema";
export {
  SyncError,
  NotFoundError,
  TransportError,
  UnknownApiError,
  UnsupportedFamilyError,
  ExtensionVersionError,
  InvalidPayloadError,
  ConfigError,
} from "@/lib/errors";

export type {
  ApiDescriptor,
  ApiFamily,
  DynatraceEntity,
  ExistsResult,
  HttpMethod,
  HttpRequest,
  HttpResponse,
  HttpTransport,
  Value,
} from "@/lib/types";
