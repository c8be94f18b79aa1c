import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from "vitest";
import { deleteCommand, upsertCommand } from "@/cli/write";
import { FakeConfigApi } from "@/test/fake-config-api";

const PROFILES_PATH = "/api/config/v1/alertingProfiles";

describe("write commands", () => {
  let dir: string;
  let config: string;
  let server: FakeConfigApi;
  let log: MockInstance<typeof console.log>;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "config-sync-cli-"));
    config = join(dir, "sync.config.json");
    await writeFile(config, JSON.stringify({ environmentUrl: "https://env.example.com", token: "test-token" }));
    server = new FakeConfigApi().seed(PROFILES_PATH);
    log = vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    log.mockRestore();
    await rm(dir, { recursive: true, force: true });
  });

  it("upserts the body read from the given file", async () => {
    const file = join(dir, "ops.json");
    await writeFile(file, '{"name":"Ops","rules":[]}\n');

    await upsertCommand("alerting-profile", "Ops", { config, file, json: true }, server);

    expect(server.objects(PROFILES_PATH)).toEqual([{ id: "cfg-1", name: "Ops", body: '{"name":"Ops","rules":[]}\n' }]);
    expect(log).toHaveBeenCalledWith(JSON.stringify({ id: "cfg-1", name: "Ops" }, null, 2));
  });

  it("replaces the existing config on a second upsert", async () => {
    const file = join(dir, "ops.json");
    await writeFile(file, '{"name":"Ops","rules":[]}');
    await upsertCommand("alerting-profile", "Ops", { config, file }, server);
    await writeFile(file, '{"name":"Ops","rules":["r1"]}');

    await upsertCommand("alerting-profile", "Ops", { config, file }, server);

    expect(server.objects(PROFILES_PATH)).toEqual([{ id: "cfg-1", name: "Ops", body: '{"name":"Ops","rules":["r1"]}' }]);
    expect(server.callsOf("PUT").map((call) => call.path)).toEqual([`${PROFILES_PATH}/cfg-1`]);
  });

  it("fails before any request when the body file is missing", async () => {
    await expect(
      upsertCommand("alerting-profile", "Ops", { config, file: join(dir, "missing.json") }, server),
    ).rejects.toThrow();
    expect(server.calls).toEqual([]);
  });

  it("deletes by name and reports the name as JSON", async () => {
    server.seed(PROFILES_PATH, [{ id: "p-1", name: "Ops" }]);

    await deleteCommand("alerting-profile", "Ops", { config, json: true }, server);

    expect(server.objects(PROFILES_PATH)).toEqual([]);
    expect(log).toHaveBeenCalledWith(JSON.stringify({ deleted: "Ops" }, null, 2));
  });
});
