import { z } from "zod";
import { ConfigError } from "../utils/errors";

const envSchema = z.object({
    NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
    HOST: z.string().min(1).default("127.0.0.1"),
    PORT: z.coerce.number().int().min(1).max(65535).default(5000),
    STATIC_ROOT: z.string().min(1, "STATIC_ROOT must name a directory").default("public"),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).optional(),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
    const result = envSchema.safeParse(source);

    if (!result.success) {
        const fieldErrors = result.error.flatten().fieldErrors;
        const problems = Object.entries(fieldErrors).map(
            ([key, msgs]) => `${key}: ${(msgs ?? []).join(", ")}`
        );
        throw new ConfigError(`Invalid environment variables (${problems.join("; ")})`, { fieldErrors });
    }

    return result.data;
}
