import dotenv from "dotenv";
import { z } from "zod";
import {
    DEFAULT_SUPPORT_KEYWORDS,
    DEFAULT_URGENT_KEYWORDS,
    createTriageConfig,
    type TriageConfig,
} from "../../domain/triage/triageConfig";

const optionalTrimmed = z
    .string()
    .optional()
    .transform((value) => {
        const trimmed = value?.trim();
        return trimmed ? trimmed : undefined;
    });

function positiveInt(name: string, fallback: number) {
    return z
        .string()
        .optional()
        .transform((value) => (value && value.trim() ? Number(value) : fallback))
        .refine((value) => Number.isInteger(value) && value > 0, `${name} must be a positive integer`);
}

function keywordList(fallback: readonly string[]) {
    return z
        .string()
        .optional()
        .transform((value) => {
            const keywords = (value ?? "")
                .split(",")
                .map((keyword) => keyword.trim().toLowerCase())
                .filter((keyword) => keyword.length > 0);
            return keywords.length > 0 ? keywords : [...fallback];
        });
}

const envSchema = z.object({
    PORT: positiveInt("PORT", 3000),
    FRONTEND_REDIRECT_URL: z.string().url().optional(),
    CORS_ORIGIN: optionalTrimmed,
    TOKEN_ENCRYPTION_KEY: optionalTrimmed,
    DB_PATH: optionalTrimmed,
    OPENAI_API_KEY: optionalTrimmed,
    OPENAI_MODEL: optionalTrimmed.transform((value) => value ?? "gpt-3.5-turbo"),
    AI_TIMEOUT_MS: positiveInt("AI_TIMEOUT_MS", 15_000),
    AI_CONCURRENCY: positiveInt("AI_CONCURRENCY", 4),
    GOOGLE_CLIENT_ID: optionalTrimmed,
    GOOGLE_CLIENT_SECRET: optionalTrimmed,
    GOOGLE_REDIRECT_URI: z.string().url().default("http://localhost:3000/oauth2callback"),
    SUPPORT_KEYWORDS: keywordList(DEFAULT_SUPPORT_KEYWORDS),
    URGENT_KEYWORDS: keywordList(DEFAULT_URGENT_KEYWORDS),
});

export type AppEnv = z.infer<typeof envSchema>;

export type AppConfig = {
    port: number;
    corsOrigins: string[];
    frontendRedirectUrl?: string;
    dbPath?: string;
    tokenEncryptionKey?: string;
    openai: {
        apiKey?: string;
        model: string;
    };
    google: {
        clientId?: string;
        clientSecret?: string;
        redirectUri: string;
    };
    triage: TriageConfig;
};

export function parseEnv(source: NodeJS.ProcessEnv): AppEnv {
    const parsed = envSchema.safeParse(source);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
        throw new Error(`Invalid environment configuration: ${issues}`);
    }
    return parsed.data;
}

export function toAppConfig(env: AppEnv): AppConfig {
    return {
        port: env.PORT,
        corsOrigins: env.CORS_ORIGIN
            ? env.CORS_ORIGIN.split(",")
                  .map((origin) => origin.trim())
                  .filter((origin) => origin.length > 0)
            : [],
        frontendRedirectUrl: env.FRONTEND_REDIRECT_URL,
        dbPath: env.DB_PATH,
        tokenEncryptionKey: env.TOKEN_ENCRYPTION_KEY,
        openai: {
            apiKey: env.OPENAI_API_KEY,
            model: env.OPENAI_MODEL,
        },
        google: {
            clientId: env.GOOGLE_CLIENT_ID,
            clientSecret: env.GOOGLE_CLIENT_SECRET,
            redirectUri: env.GOOGLE_REDIRECT_URI,
        },
        triage: createTriageConfig({
            supportKeywords: env.SUPPORT_KEYWORDS,
            urgentKeywords: env.URGENT_KEYWORDS,
            aiTimeoutMs: env.AI_TIMEOUT_MS,
            aiConcurrency: env.AI_CONCURRENCY,
        }),
    };
}

export function loadConfig(): AppConfig {
    dotenv.config();
    return toAppConfig(parseEnv(process.env));
}
