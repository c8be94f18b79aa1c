// ============ API Descriptors ============

/** Upsert strategy tag of a configuration API family. */
export type ApiFamily = "standard" | "extension";

export interface ApiDescriptor {
  /** Stable family identifier, e.g. "alerting-profile" */
  id: string;
  urlPath: string;
  family: ApiFamily;
  getUrl(environmentUrl: string): string;
}

// ============ Remote Objects ============

/** Summary of one remote object as returned by a list call */
export interface Value {
  id: string;
  name: string;
}

export interface DynatraceEntity {
  id: string;
  name: string;
  description?: string;
}

export interface ExistsResult {
  exists: boolean;
  id: string;
}

// ============ Transport ============

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  token: string;
  /** JSON text, or a multipart form for uploads */
  body?: string | FormData;
}

export interface HttpResponse {
  status: number;
  body: string;
  headers: Headers;
}

/**
 * Sends one request and resolves with whatever the server answered,
 * whatever the status. Rejects only when no response was received.
 */
export interface HttpTransport {
  request(request: HttpRequest): Promise<HttpResponse>;
}
