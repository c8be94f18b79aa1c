import { consola } from "consola";
import { createFetch } from "ofetch";
import pRetry from "p-retry";
import { AUTH_SCHEME, HTTP_DEFAULTS } from "@/lib/constants";
import { errorMessage, TransportError } from "@/lib/errors";
import type { HttpMethod, HttpRequest, HttpResponse, HttpTransport } from "@/lib/types";

export interface HttpTransportOptions {
  timeoutMs?: number;
  /** Extra attempts after a network-level failure. Status errors are never retried. */
  retries?: number;
  retryDelayMs?: number;
  fetch?: typeof globalThis.fetch;
}

export function createHttpTransport(options: HttpTransportOptions = {}): HttpTransport {
  const {
    timeoutMs = HTTP_DEFAULTS.TIMEOUT_MS,
    retries = HTTP_DEFAULTS.RETRIES,
    retryDelayMs = HTTP_DEFAULTS.RETRY_DELAY_MS,
  } = options;
  const $fetch = createFetch({ fetch: options.fetch ?? globalThis.fetch });

  return {
    async request({ method, url, token, body }: HttpRequest): Promise<HttpResponse> {
      const headers: Record<string, string> = {
        Authorization: `${AUTH_SCHEME} ${token}`,
        Accept: "application/json",
      };
      if (typeof body === "string") {
        headers["Content-Type"] = "application/json";
      }

      return pRetry(
        async () => {
          try {
            const response = await $fetch.raw<string, "text">(url, {
              method,
              headers,
              body,
              responseType: "text",
              timeout: timeoutMs,
              retry: false,
              ignoreResponseError: true,
            });
            return {
              status: response.status,
              body: response._data ?? "",
              headers: response.headers,
            };
          } catch (error) {
            throw new TransportError(`${method} ${url} failed: ${errorMessage(error)}`, {
              method,
              url,
              cause: error,
            });
          }
        },
        {
          retries,
          factor: 2,
          minTimeout: retryDelayMs,
          maxTimeout: 10_000,
          randomize: false,
          onFailedAttempt: (error) => {
            if (error.retriesLeft > 0) {
              consola.warn(`Retry ${error.attemptNumber}/${retries}: ${error.message}`);
            }
          },
        },
      );
    },
  };
}

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * Turn a non-2xx response into a TransportError
 */
export function assertOk(method: HttpMethod, url: string, response: HttpResponse): HttpResponse {
  if (isSuccess(response.status)) return response;
  throw new TransportError(
    `${method} ${url} failed (HTTP ${response.status})${response.body ? `: ${response.body}` : ""}`,
    { method, url, status: response.status, body: response.body },
  );
}
