import type { ApiDescriptor, DynatraceEntity, HttpMethod, HttpResponse } from "@/lib/types";

export interface UpsertContext {
  api: ApiDescriptor;
  /** Collection endpoint of the family */
  url: string;
  name: string;
  body: string;
  /** Sends one authenticated request; the status is left to the caller */
  request(method: HttpMethod, url: string, body?: string | FormData): Promise<HttpResponse>;
  /** Resolves the name to the id currently backing it */
  resolve(): Promise<string | undefined>;
}

export interface StandardJsonUpsert {
  kind: "standard";
  upsert(context: UpsertContext): Promise<DynatraceEntity>;
}

export interface ExtensionUpload {
  kind: "extension";
  upsert(context: UpsertContext): Promise<DynatraceEntity>;
}

export type UpsertStrategy = StandardJsonUpsert | ExtensionUpload;
