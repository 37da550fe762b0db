import express from "express";
import cors from "cors";
import { z } from "zod";
import type { TriageService } from "../application/triage/triageService";
import { ValidationFailure, errorMessage } from "../domain/errors";
import type { AuditLogger } from "../domain/triage/types";
import type { MailAuthorizer } from "../infrastructure/mail/gmailAccount";

export const APP_VERSION = "1.0.0";

type ApiErrorCode = "BAD_REQUEST" | "NOT_FOUND" | "INTERNAL_ERROR";

export type AppDeps = {
    triageService: TriageService;
    mailAuth: MailAuthorizer;
    log: AuditLogger;
    corsOrigins?: string[];
    frontendRedirectUrl?: string;
};

const sendResponseSchema = z.object({
    recipient: z.string({ required_error: "recipient is required" }).trim().min(1, "recipient must not be empty"),
    subject: z.string({ required_error: "subject is required" }),
    response: z.string({ required_error: "response is required" }).trim().min(1, "response must not be empty"),
});

function sendError(res: express.Response, status: number, code: ApiErrorCode, message: string, details?: string) {
    return res.status(status).json({
        message: "error",
        error: {
            code,
            message,
            ...(details ? { details } : {}),
        },
    });
}

export function parseDays(
    rawDays: unknown,
    options: { fallback: number; min: number; max: number }
): { value: number; error?: string } {
    const { fallback, min, max } = options;
    if (rawDays === undefined) {
        return { value: fallback };
    }

    const parsed = typeof rawDays === "string" ? Number(rawDays) : Number.NaN;
    if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
        return { value: fallback, error: `days must be an integer between ${min} and ${max}` };
    }

    return { value: parsed };
}

function parseBody<T>(schema: z.ZodType<T>, body: unknown): T {
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
        const details = parsed.error.issues
            .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
            .join("; ");
        throw new ValidationFailure("Invalid request body", details);
    }
    return parsed.data;
}

export function createApp(deps: AppDeps) {
    const { triageService, mailAuth, log } = deps;
    const allowedOrigins = deps.corsOrigins ?? [];
    const app = express();
    app.use(express.json());

    app.use(
        cors({
            origin: (origin, callback) => {
                if (!origin || allowedOrigins.length === 0 || allowedOrigins.includes(origin)) {
                    return callback(null, true);
                }
                return callback(new Error("CORS origin denied"));
            },
        })
    );

    app.use((req, res, next) => {
        const startedAt = Date.now();
        res.on("finish", () => {
            log("http_request", {
                method: req.method,
                path: req.originalUrl,
                status: res.statusCode,
                durationMs: Date.now() - startedAt,
            });
        });
        next();
    });

    app.get("/", (req, res) => {
        res.json({ status: "API running" });
    });

    app.get("/health", (req, res) => {
        res.json({ status: "ok" });
    });

    app.get("/api/health", (req, res) => {
        res.json({
            status: "healthy",
            timestamp: new Date().toISOString(),
            version: APP_VERSION,
        });
    });

    app.get("/auth/google", (req, res) => {
        try {
            res.redirect(mailAuth.getAuthUrl());
        } catch (err) {
            sendError(res, 500, "INTERNAL_ERROR", errorMessage(err));
        }
    });

    app.get("/oauth2callback", async (req, res) => {
        try {
            const code = typeof req.query.code === "string" ? req.query.code : undefined;
            if (!code) {
                return sendError(res, 400, "BAD_REQUEST", "Missing code");
            }

            const { accountEmail } = await mailAuth.completeAuthorization(code);
            log("auth_oauth_success", {
                accountEmail,
                redirectedToFrontend: Boolean(deps.frontendRedirectUrl),
            });

            if (deps.frontendRedirectUrl) {
                return res.redirect(`${deps.frontendRedirectUrl}?oauth=success`);
            }
            return res.json({ message: "OAuth successful", accountEmail });
        } catch (err) {
            log("auth_oauth_failed", { reason: errorMessage(err) });
            return sendError(res, 500, "INTERNAL_ERROR", errorMessage(err));
        }
    });

    app.get("/auth/status", (req, res) => {
        res.json(mailAuth.status());
    });

    app.post("/auth/logout", (req, res) => {
        mailAuth.disconnect();
        log("auth_logout");
        res.json({ message: "logged_out" });
    });

    app.get("/api/fetch-emails", async (req, res) => {
        try {
            const daysParse = parseDays(req.query.days, { fallback: 1, min: 1, max: 30 });
            if (daysParse.error) {
                return sendError(res, 400, "BAD_REQUEST", "Invalid query parameter", daysParse.error);
            }

            const { items, stats } = await triageService.fetchAndProcess(daysParse.value);
            return res.json({ message: "ok", items, stats });
        } catch (err) {
            return sendError(res, 500, "INTERNAL_ERROR", errorMessage(err));
        }
    });

    app.get("/api/emails", (req, res) => {
        try {
            const daysParse = parseDays(req.query.days, { fallback: 7, min: 1, max: 90 });
            if (daysParse.error) {
                return sendError(res, 400, "BAD_REQUEST", "Invalid query parameter", daysParse.error);
            }

            return res.json({ message: "ok", items: triageService.listRecords(daysParse.value) });
        } catch (err) {
            return sendError(res, 500, "INTERNAL_ERROR", errorMessage(err));
        }
    });

    app.post("/api/send-response", async (req, res) => {
        try {
            const input = parseBody(sendResponseSchema, req.body);
            const success = await triageService.sendResponse(input);
            return res.json({ message: "ok", success });
        } catch (err) {
            if (err instanceof ValidationFailure) {
                return sendError(res, 400, "BAD_REQUEST", err.message, err.details);
            }
            return sendError(res, 500, "INTERNAL_ERROR", errorMessage(err));
        }
    });

    app.get("/api/analytics", (req, res) => {
        try {
            return res.json({ message: "ok", analytics: triageService.analytics() });
        } catch (err) {
            return sendError(res, 500, "INTERNAL_ERROR", errorMessage(err));
        }
    });

    app.use((req, res) => {
        sendError(res, 404, "NOT_FOUND", `No route for ${req.method} ${req.path}`);
    });

    app.use((err: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
        if (err instanceof SyntaxError && "body" in err) {
            return sendError(res, 400, "BAD_REQUEST", "Invalid JSON body");
        }
        if (res.headersSent) {
            return next(err);
        }
        return sendError(res, 500, "INTERNAL_ERROR", errorMessage(err));
    });

    return app;
}
