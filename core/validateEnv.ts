import { z } from "zod";

const booleanFlag = z
    .string()
    .regex(/^(true|false|1|0)$/i, "must be one of true, false, 1, 0");

const envSchema = z.object({
    // Hook engine
    JSONAPI_LOAD_DATABASE_VALUES: booleanFlag.optional(),

    // Logging
    LOG_LEVEL: z
        .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
        .optional(),
    LOG_PRETTY: booleanFlag.optional(),

    // App config
    NODE_ENV: z.enum(["development", "production", "test"]).optional(),
    DEBUG: booleanFlag.optional(),
});

export type ValidatedEnv = z.infer<typeof envSchema>;

export function validateEnv(env: NodeJS.ProcessEnv = process.env): ValidatedEnv {
    const result = envSchema.safeParse(env);
    if (!result.success) {
        const messages = result.error.issues.map(
            (issue) =>
                `  - ${issue.path.length ? issue.path.join(".") + ": " : ""}${issue.message}`,
        );
        throw new Error(
            `Environment validation failed:\n${messages.join("\n")}`,
        );
    }
    return result.data;
}
