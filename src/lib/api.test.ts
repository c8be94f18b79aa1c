import { describe, expect, it } from "vitest";
import { createApi, getApi, listApis } from "@/lib/api";
import { UnknownApiError } from "@/lib/errors";

describe("api catalog", () => {
  it("builds collection urls from the environment url", () => {
    const api = getApi("alerting-profile");

    expect(api.getUrl("https://env.example.com/")).toBe("https://env.example.com/api/config/v1/alertingProfiles");
    expect(api.family).toBe("standard");
  });

  it("marks only the extension family for upload", () => {
    expect(listApis().filter((api) => api.family === "extension").map((api) => api.id)).toEqual(["extension"]);
  });

  it("rejects unknown ids", () => {
    expect(() => getApi("alerting-profiles")).toThrow(UnknownApiError);
  });

  it("normalizes custom descriptors", () => {
    const api = createApi("custom-family", "api/config/v1/custom");

    expect(api).toMatchObject({ id: "custom-family", urlPath: "/api/config/v1/custom", family: "standard" });
    expect(createApi("extension", "/api/config/v1/extensions").family).toBe("extension");
  });
});
