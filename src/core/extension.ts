import { consola } from "consola";
import JSZip from "jszip";
import { z } from "zod/v4";
import type { ExtensionUpload } from "@/core/types";
import { ExtensionVersionError, InvalidPayloadError, TransportError } from "@/lib/errors";
import { assertOk } from "@/lib/http";
import { compareVersions, joinUrl } from "@/lib/utils";

const ExtensionManifestSchema = z.object({
  version: z.string().min(1),
});

const DeployedExtensionSchema = z.object({
  version: z.string(),
});

export type ExtensionStatus = "needs-upload" | "up-to-date";

function parseManifestVersion(name: string, manifest: string): string {
  let raw: unknown;
  try {
    raw = JSON.parse(manifest);
  } catch (error) {
    throw new InvalidPayloadError(`Extension "${name}" manifest is not valid JSON`, { cause: error });
  }
  const parsed = ExtensionManifestSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidPayloadError(`Extension "${name}" manifest has no version`);
  }
  return parsed.data.version;
}

function parseDeployedVersion(url: string, body: string): string {
  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch (error) {
    throw new TransportError(`GET ${url} returned invalid JSON`, { method: "GET", url, body, cause: error });
  }
  const parsed = DeployedExtensionSchema.safeParse(raw);
  if (!parsed.success) {
    throw new TransportError(`GET ${url} returned no extension version`, { method: "GET", url, body });
  }
  return parsed.data.version;
}

/**
 * Decide whether the deployed extension must be replaced by the local version.
 * A deployed version newer than the local one is an error.
 */
export function extensionStatus(name: string, deployedVersion: string | undefined, localVersion: string): ExtensionStatus {
  if (deployedVersion === undefined) return "needs-upload";
  const order = compareVersions(deployedVersion, localVersion);
  if (order > 0) {
    throw new ExtensionVersionError(name, deployedVersion, localVersion);
  }
  return order === 0 ? "up-to-date" : "needs-upload";
}

/**
 * Zip the manifest as <name>/plugin.json and wrap it as the "file" part of a multipart form
 */
export async function buildExtensionForm(name: string, manifest: string): Promise<FormData> {
  const zip = new JSZip();
  zip.file(`${name}/plugin.json`, manifest);
  const archive = await zip.generateAsync({ type: "arraybuffer" });

  const form = new FormData();
  form.append("file", new Blob([archive], { type: "application/zip" }), `${name}.zip`);
  return form;
}

export const extensionUpload: ExtensionUpload = {
  kind: "extension",

  async upsert({ api, url, name, body, request }) {
    const localVersion = parseManifestVersion(name, body);

    const extensionUrl = joinUrl(url, name);
    const current = await request("GET", extensionUrl);
    let deployedVersion: string | undefined;
    if (current.status !== 404) {
      assertOk("GET", extensionUrl, current);
      deployedVersion = parseDeployedVersion(extensionUrl, current.body);
    }

    if (extensionStatus(name, deployedVersion, localVersion) === "up-to-date") {
      consola.info(`[${api.id}] "${name}" already at version ${localVersion}, skipping upload`);
      return { id: name, name };
    }

    const form = await buildExtensionForm(name, body);
    assertOk("POST", url, await request("POST", url, form));

    consola.info(`[${api.id}] Uploaded "${name}" version ${localVersion}`);
    return { id: name, name };
  },
};
