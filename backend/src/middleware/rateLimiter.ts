import rateLimit from "express-rate-limit";

// Deployed behind a reverse proxy that sets X-Forwarded-For; app.set("trust proxy")
// handles IP detection, so the library's own proxy validation is turned off.
const trustProxyValidation = { validate: { trustProxy: false } };

// General API limiter (600 req/minute per IP), mounted on /api/releases only
export const apiLimiter = rateLimit({
    windowMs: 1 * 60 * 1000,
    max: 600,
    message: "Too many requests from this IP, please try again later.",
    standardHeaders: true,
    legacyHeaders: false,
    ...trustProxyValidation,
});

// Edit submissions (60 per 15 minutes per IP); rejected forms count too
export const editLimiter = rateLimit({
    windowMs: 15 * 60 * 1000,
    max: 60,
    message: "Too many edits submitted, please wait before submitting more.",
    standardHeaders: true,
    legacyHeaders: false,
    ...trustProxyValidation,
});
