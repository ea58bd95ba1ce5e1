import dotenv from "dotenv";
import { z } from "zod";
import { logger } from "./utils/logger";
import {
    isEnvFlagEnabled,
    parseEnvCsv,
    parseEnvInt,
} from "./utils/envParsers";

dotenv.config();

export const envSchema = z.object({
    DATABASE_URL: z.string().min(1, "DATABASE_URL is required"),
    JWT_SECRET: z
        .string()
        .min(32, "JWT_SECRET must be at least 32 characters"),
    PORT: z.string().regex(/^\d+$/, "PORT must be a number").optional(),
    NODE_ENV: z.enum(["development", "production", "test"]).optional(),
    LOG_LEVEL: z
        .enum(["debug", "info", "warn", "error", "silent"])
        .optional(),
    LOG_FORMAT: z.enum(["text", "json"]).optional(),
});

export type Env = z.infer<typeof envSchema>;

function loadEnv(): Env {
    const parsed = envSchema.safeParse(process.env);
    if (parsed.success) {
        logger.debug("Environment variables validated");
        return parsed.data;
    }

    logger.error(" Environment validation failed:");
    parsed.error.errors.forEach((err) => {
        logger.error(`   - ${err.path.join(".")}: ${err.message}`);
    });
    logger.error(
        "\n Please check your .env file and ensure all required variables are set."
    );
    process.exit(1);
}

const env = loadEnv();
const allowedOrigins: string[] | true =
    parseEnvCsv(process.env.ALLOWED_ORIGINS) ??
    (env.NODE_ENV === "production" ? [] : true);

/** Centralized runtime configuration object for the API process. */
export const config = {
    port: parseEnvInt(env.PORT, 3006),
    nodeEnv: env.NODE_ENV ?? "development",
    databaseUrl: env.DATABASE_URL,
    jwtSecret: env.JWT_SECRET,

    database: {
        poolSize: Math.max(1, parseEnvInt(process.env.DATABASE_POOL_SIZE, 4)),
        poolTimeoutSeconds: parseEnvInt(process.env.DATABASE_POOL_TIMEOUT, 30),
        logQueries: isEnvFlagEnabled(process.env.LOG_QUERIES),
    },

    docsPublic: isEnvFlagEnabled(process.env.DOCS_PUBLIC),

    allowedOrigins,
};

export type AppConfig = typeof config;
