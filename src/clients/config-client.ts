import { consola } from "consola";
import { ListScanResolver, type NameResolver } from "@/core/resolve";
import { selectStrategy } from "@/core/upsert";
import { parseValues } from "@/core/values";
import { NotFoundError } from "@/lib/errors";
import { assertOk, createHttpTransport } from "@/lib/http";
import type {
  ApiDescriptor,
  DynatraceEntity,
  ExistsResult,
  HttpMethod,
  HttpResponse,
  HttpTransport,
  Value,
} from "@/lib/types";
import { joinUrl, trimTrailingSlash } from "@/lib/utils";

export interface ConfigClientOptions {
  environmentUrl: string;
  token: string;
  transport?: HttpTransport;
  resolver?: NameResolver;
}

/**
 * Name-addressed CRUD over the id-addressed config API.
 *
 * Callers address configs by name; every call resolves the name against a
 * fresh listing, so nothing is cached between calls. The family-specific
 * upload rules (extensions) are hidden behind upsertByName.
 *
 * Two concurrent upserts of the same name may both create. Callers that need
 * otherwise must serialize writes per name.
 *
 * Extensions are addressed by their id (e.g. "custom.python.demo"), and the
 * entity returned for one carries that id as its name. The platform's
 * extension listing reports display names instead, so existsByName on an
 * extension id can miss even right after a successful upsert.
 */
export class ConfigClient {
  private readonly environmentUrl: string;
  private readonly token: string;
  private readonly transport: HttpTransport;
  private readonly resolver: NameResolver;

  constructor(options: ConfigClientOptions) {
    this.environmentUrl = trimTrailingSlash(options.environmentUrl);
    this.token = options.token;
    this.transport = options.transport ?? createHttpTransport();
    this.resolver = options.resolver ?? new ListScanResolver((api) => this.list(api));
  }

  private request(method: HttpMethod, url: string, body?: string | FormData): Promise<HttpResponse> {
    consola.debug(`${method} ${url}`);
    return this.transport.request({ method, url, token: this.token, body });
  }

  private async send(method: HttpMethod, url: string): Promise<HttpResponse> {
    return assertOk(method, url, await this.request(method, url));
  }

  /**
   * GET <environment-url><api path>, e.g. /api/config/v1/alertingProfiles
   */
  async list(api: ApiDescriptor): Promise<Value[]> {
    const url = api.getUrl(this.environmentUrl);
    const response = await this.send("GET", url);
    return parseValues(api.id, response.body, url);
  }

  async existsByName(api: ApiDescriptor, name: string): Promise<ExistsResult> {
    const id = await this.resolver.resolve(api, name);
    return id === undefined ? { exists: false, id: "" } : { exists: true, id };
  }

  async readByName(api: ApiDescriptor, name: string): Promise<string> {
    const { exists, id } = await this.existsByName(api, name);
    if (!exists) {
      throw new NotFoundError(api.id, name);
    }
    return this.readById(api, id);
  }

  async readById(api: ApiDescriptor, id: string): Promise<string> {
    const response = await this.send("GET", joinUrl(api.getUrl(this.environmentUrl), id));
    return response.body;
  }

  /**
   * Create the config if no config of that name exists, replace it otherwise.
   * Extensions are uploaded as a zipped manifest instead.
   */
  async upsertByName(api: ApiDescriptor, name: string, body: string): Promise<DynatraceEntity> {
    const strategy = selectStrategy(api);
    consola.debug(`[${api.id}] Upserting "${name}" via ${strategy.kind} strategy`);
    return strategy.upsert({
      api,
      url: api.getUrl(this.environmentUrl),
      name,
      body,
      request: (method, url, payload) => this.request(method, url, payload),
      resolve: () => this.resolver.resolve(api, name),
    });
  }

  /**
   * Deleting a name that does not exist is a no-op.
   */
  async deleteByName(api: ApiDescriptor, name: string): Promise<void> {
    const id = await this.resolver.resolve(api, name);
    if (id === undefined) {
      consola.debug(`[${api.id}] "${name}" not found, nothing to delete`);
      return;
    }
    await this.send("DELETE", joinUrl(api.getUrl(this.environmentUrl), id));
    consola.info(`[${api.id}] Deleted "${name}" (${id})`);
  }
}
