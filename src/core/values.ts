import { z } from "zod/v4";
import { LIST_ENVELOPE_KEYS } from "@/lib/constants";
import { TransportError } from "@/lib/errors";
import type { Value } from "@/lib/types";

// Synthetic families identify their items by entityId instead of id
const ListItemSchema = z.object({
  id: z.string().optional(),
  entityId: z.string().optional(),
  name: z.string().nullish(),
});

const ListItemsSchema = z.array(ListItemSchema);

const ListEnvelopeSchema = z.object({
  values: ListItemsSchema.optional(),
  dashboards: ListItemsSchema.optional(),
  extensions: ListItemsSchema.optional(),
  locations: ListItemsSchema.optional(),
  monitors: ListItemsSchema.optional(),
});

const ListBodySchema = z.union([ListItemsSchema, ListEnvelopeSchema]);

type ListItem = z.output<typeof ListItemSchema>;

function pickItems(body: z.output<typeof ListBodySchema>): ListItem[] | undefined {
  if (Array.isArray(body)) return body;
  for (const key of LIST_ENVELOPE_KEYS) {
    const items = body[key];
    if (items) return items;
  }
  return undefined;
}

/**
 * Parse a list response into (id, name) summaries, in list order.
 * Items lacking an id or a name are skipped.
 */
export function parseValues(apiId: string, text: string, url: string): Value[] {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new TransportError(`[${apiId}] list response is not valid JSON`, {
      method: "GET",
      url,
      body: text,
      cause: error,
    });
  }

  const parsed = ListBodySchema.safeParse(raw);
  const items = parsed.success ? pickItems(parsed.data) : undefined;
  if (!items) {
    throw new TransportError(`[${apiId}] unexpected list response shape`, { method: "GET", url, body: text });
  }

  const values: Value[] = [];
  for (const item of items) {
    const id = item.id ?? item.entityId;
    if (!id || item.name == null) continue;
    values.push({ id, name: item.name });
  }
  return values;
}
