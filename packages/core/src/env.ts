import { createEnv } from "@t3-oss/env-core";
import { z } from "zod";

export const env = createEnv({
  server: {
    LOG_LEVEL: z.string().default("info"),
    NODE_ENV: z.string().default("development"),
    PARLEY_USER_ALIAS: z.string().min(1).default("USER"),
  },
  clientPrefix: "PUBLIC_",
  client: {},
  runtimeEnv: process.env,
  emptyStringAsUndefined: true,
});
