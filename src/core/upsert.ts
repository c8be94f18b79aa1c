import { consola } from "consola";
import { z } from "zod/v4";
import { extensionUpload } from "@/core/extension";
import type { StandardJsonUpsert, UpsertStrategy } from "@/core/types";
import { UnsupportedFamilyError, TransportError } from "@/lib/errors";
import { assertOk } from "@/lib/http";
import type { ApiDescriptor, DynatraceEntity, HttpResponse } from "@/lib/types";
import { joinUrl, lastPathSegment } from "@/lib/utils";

const CreatedEntitySchema = z.object({
  id: z.string().optional(),
  entityId: z.string().optional(),
  name: z.string().optional(),
  description: z.string().optional(),
});

function tryParseJson(text: string): unknown {
  if (!text.trim()) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

// The id comes from the response body, or from the Location header when the body has none
function parseCreatedEntity(name: string, response: HttpResponse): DynatraceEntity | undefined {
  const parsed = CreatedEntitySchema.safeParse(tryParseJson(response.body));
  const created: z.output<typeof CreatedEntitySchema> = parsed.success ? parsed.data : {};

  const location = response.headers.get("location");
  const id = created.id ?? created.entityId ?? (location ? lastPathSegment(location) : undefined);
  if (!id) return undefined;

  return {
    id,
    name: created.name ?? name,
    ...(created.description !== undefined && { description: created.description }),
  };
}

export const standardJsonUpsert: StandardJsonUpsert = {
  kind: "standard",

  async upsert({ api, url, name, body, request, resolve }) {
    const existingId = await resolve();

    if (existingId === undefined) {
      const response = assertOk("POST", url, await request("POST", url, body));
      const entity = parseCreatedEntity(name, response);
      if (!entity) {
        throw new TransportError(`[${api.id}] created "${name}" but no id was returned`, {
          method: "POST",
          url,
          status: response.status,
          body: response.body,
        });
      }
      consola.info(`[${api.id}] Created "${name}" (${entity.id})`);
      return entity;
    }

    const objectUrl = joinUrl(url, existingId);
    assertOk("PUT", objectUrl, await request("PUT", objectUrl, body));
    consola.info(`[${api.id}] Updated "${name}" (${existingId})`);
    return { id: existingId, name };
  },
};

/**
 * Single dispatch point from an API family to its upsert strategy.
 */
export function selectStrategy(api: ApiDescriptor): UpsertStrategy {
  const family = api.family;
  switch (family) {
    case "standard":
      return standardJsonUpsert;
    case "extension":
      return extensionUpload;
    default: {
      const unsupported: never = family;
      throw new UnsupportedFamilyError(api.id, String(unsupported));
    }
  }
}
