import express, { type Express } from "express";
import cors from "cors";
import helmet from "helmet";
import compression from "compression";
import swaggerUi from "swagger-ui-express";
import { config } from "./config";
import { BRAND_API_DOCS_TITLE, BRAND_NAME } from "./config/brand";
import { swaggerSpec } from "./config/swagger";
import { assignRequestId, requireAuth } from "./middleware/auth";
import { errorHandler } from "./middleware/errorHandler";
import { apiLimiter } from "./middleware/rateLimiter";
import releasesRoutes from "./routes/releases";
import { checkDatabaseConnection } from "./utils/db";
import { logger } from "./utils/logger";

export interface HealthPayload {
    status: "ok" | "unavailable";
    service: string;
    uptimeSeconds: number;
}

function buildHealthPayload(healthy: boolean): HealthPayload {
    return {
        status: healthy ? "ok" : "unavailable",
        service: BRAND_NAME,
        uptimeSeconds: Math.round(process.uptime()),
    };
}

export function createApp(): Express {
    const app = express();

    app.set("trust proxy", true);
    app.use(helmet());
    app.use(
        cors({
            origin: (origin, callback) => {
                if (!origin || config.allowedOrigins === true) {
                    callback(null, true);
                    return;
                }
                if (config.allowedOrigins.includes(origin)) {
                    callback(null, true);
                    return;
                }
                logger.debug(`[CORS] Rejected origin ${origin}`);
                callback(null, false);
            },
            credentials: true,
        })
    );
    app.use(compression({ threshold: 1024 }));
    // Merge submissions carry one entry per medium
    app.use(express.json({ limit: "1mb" }));
    app.use(assignRequestId);

    app.use("/api/releases", apiLimiter, releasesRoutes);

    const health: express.RequestHandler = async (_req, res) => {
        try {
            await checkDatabaseConnection();
            res.json(buildHealthPayload(true));
        } catch (error) {
            logger.error("[Health] Database check failed:", error);
            res.status(503).json(buildHealthPayload(false));
        }
    };
    app.get("/health", health);
    app.get("/api/health", health);

    // The raw OpenAPI document requires auth in production unless DOCS_PUBLIC=true
    const specMiddleware =
        config.nodeEnv === "production" && !config.docsPublic ? [requireAuth] : [];

    app.use(
        "/api/docs",
        swaggerUi.serve,
        swaggerUi.setup(swaggerSpec, {
            customCss: ".swagger-ui .topbar { display: none }",
            customSiteTitle: BRAND_API_DOCS_TITLE,
        })
    );
    app.get("/api/docs.json", ...specMiddleware, (_req, res) => {
        res.json(swaggerSpec);
    });

    app.use(errorHandler);

    return app;
}
