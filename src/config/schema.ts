import { z } from "zod/v4";
import { HTTP_DEFAULTS } from "@/lib/constants";

const NonEmptyString = z.string().trim().min(1);

export const ConfigSchema = z
  .object({
    environmentUrl: z.url(),
    token: NonEmptyString.optional(),
    tokenEnv: NonEmptyString.optional(),
    timeoutMs: z.number().int().positive().default(HTTP_DEFAULTS.TIMEOUT_MS),
    retries: z.number().int().min(0).max(10).default(HTTP_DEFAULTS.RETRIES),
  })
  .superRefine((config, ctx) => {
    if ((config.token === undefined) === (config.tokenEnv === undefined)) {
      ctx.addIssue({
        code: "custom",
        path: ["token"],
        message: "exactly one of token or tokenEnv is required",
      });
    }
  });

export type AppConfig = z.output<typeof ConfigSchema>;

export interface RuntimeConfig {
  environmentUrl: string;
  token: string;
  timeoutMs: number;
  retries: number;
}
