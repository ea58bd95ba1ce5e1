import { sql } from "drizzle-orm";
import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import { Pool } from "pg";
import { config } from "../config";
import * as schema from "../db/schema";
import { logger } from "./logger";

export type Database = NodePgDatabase<typeof schema>;
export type DbTransaction = Parameters<
    Parameters<Database["transaction"]>[0]
>[0];

export const pool = new Pool({
    connectionString: config.databaseUrl,
    max: config.database.poolSize,
    connectionTimeoutMillis: config.database.poolTimeoutSeconds * 1000,
});

pool.on("error", (error) => {
    logger.error("[Database] Idle client error:", error);
});

export const db: Database = drizzle(pool, {
    schema,
    logger: config.nodeEnv === "development" && config.database.logQueries,
});

logger.info(
    `Database connection pool configured: limit=${config.database.poolSize}, timeout=${config.database.poolTimeoutSeconds}s`,
);

export async function checkDatabaseConnection(): Promise<void> {
    await db.execute(sql`SELECT 1`);
}

export { schema };
