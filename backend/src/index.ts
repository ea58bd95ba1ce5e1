import { createServer } from "http";
import type { Socket } from "net";
import { createApp } from "./app";
import { config } from "./config";
import { BRAND_NAME } from "./config/brand";
import { checkDatabaseConnection, pool } from "./utils/db";
import { logger } from "./utils/logger";

const HTTP_SERVER_CLOSE_TIMEOUT_MS = 12_000;

const app = createApp();
const httpServer = createServer(app);
const activeHttpConnections = new Set<Socket>();

httpServer.on("connection", (socket: Socket) => {
    activeHttpConnections.add(socket);
    socket.on("close", () => {
        activeHttpConnections.delete(socket);
    });
});

async function start(): Promise<void> {
    try {
        await checkDatabaseConnection();
        logger.info("✓ PostgreSQL connection verified");
    } catch (error) {
        logger.error("✗ PostgreSQL connection failed:", {
            error: error instanceof Error ? error.message : String(error),
        });
        process.exit(1);
    }

    httpServer.listen(config.port, "0.0.0.0", () => {
        logger.info(
            `${BRAND_NAME} API listening on port ${config.port} (${config.nodeEnv})`
        );
        logger.info(`API docs available at /api/docs`);
    });
}

async function closeHttpServerWithTimeout(timeoutMs: number): Promise<void> {
    await new Promise<void>((resolve) => {
        let settled = false;
        const finish = () => {
            if (settled) return;
            settled = true;
            clearTimeout(timeoutId);
            resolve();
        };

        const timeoutId = setTimeout(() => {
            if (activeHttpConnections.size > 0) {
                logger.warn(
                    `[Shutdown] HTTP server close timed out after ${timeoutMs}ms; forcing ${activeHttpConnections.size} active connection(s) closed`
                );
            }
            for (const socket of activeHttpConnections) {
                socket.destroy();
            }
            httpServer.closeAllConnections();
            finish();
        }, timeoutMs);
        timeoutId.unref();

        httpServer.close(() => finish());
        httpServer.closeIdleConnections();
    });
}

let isShuttingDown = false;

async function gracefulShutdown(signal: string): Promise<void> {
    if (isShuttingDown) {
        logger.debug("Shutdown already in progress...");
        return;
    }
    isShuttingDown = true;
    logger.info(`Received ${signal}. Starting graceful shutdown...`);

    try {
        await closeHttpServerWithTimeout(HTTP_SERVER_CLOSE_TIMEOUT_MS);

        logger.debug("Closing database pool...");
        await pool.end();

        logger.info("Graceful shutdown complete");
        process.exit(0);
    } catch (error) {
        logger.error("Error during shutdown:", error);
        process.exit(1);
    }
}

process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
process.on("SIGINT", () => void gracefulShutdown("SIGINT"));

process.on("unhandledRejection", (reason) => {
    logger.error("Unhandled Promise Rejection:", {
        reason: reason instanceof Error ? reason.message : String(reason),
        stack: reason instanceof Error ? reason.stack : undefined,
    });
});

process.on("uncaughtException", (error) => {
    logger.error("Uncaught Exception - initiating graceful shutdown:", {
        message: error.message,
        stack: error.stack,
    });
    gracefulShutdown("uncaughtException").catch(() => {
        process.exit(1);
    });
});

void start();
