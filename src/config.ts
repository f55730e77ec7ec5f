import "dotenv/config";
import { z } from "zod";

const Env = z.object({
  QUIZ_RECORDS_DIR: z.string().min(1).default("./quiz_records"),
  LOG_DIR: z.string().min(1).default("./logs"),
  LOG_LEVEL: z
    .enum(["error", "warn", "info", "http", "verbose", "debug", "silly"])
    .optional(),
  NODE_ENV: z.string().optional(),
});

export type AppConfig = z.infer<typeof Env>;

export const config: AppConfig = Env.parse(process.env);
