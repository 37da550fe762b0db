import { createApp } from "./api/serverApp";
import { TriageService } from "./application/triage/triageService";
import { TriagePipeline } from "./domain/triage/triagePipeline";
import { OpenAITextService } from "./infrastructure/ai/openaiTextService";
import { loadConfig, type AppConfig } from "./infrastructure/config/env";
import { logAudit } from "./infrastructure/logging/audit";
import { GmailAccount } from "./infrastructure/mail/gmailAccount";
import { GmailGateway } from "./infrastructure/mail/gmailGateway";
import { LOCAL_DEV_ENCRYPTION_KEY } from "./infrastructure/oauthTokenCrypto";
import { MailTokenRepository } from "./infrastructure/repositories/mailTokenRepository";
import { TriageRecordRepository } from "./infrastructure/repositories/triageRecordRepository";
import { openDatabase } from "./infrastructure/sqlite";

export function buildApp(config: AppConfig) {
    const db = openDatabase(config.dbPath);
    const store = new TriageRecordRepository(db);
    const mailAccount = new GmailAccount(
        config.google,
        new MailTokenRepository(db, config.tokenEncryptionKey ?? LOCAL_DEV_ENCRYPTION_KEY)
    );
    const gateway = new GmailGateway(() => mailAccount.authorizedClient(), logAudit);
    const textService = new OpenAITextService({
        apiKey: config.openai.apiKey,
        model: config.openai.model,
        timeoutMs: config.triage.aiTimeoutMs,
    });
    const pipeline = new TriagePipeline({
        textService,
        store,
        config: config.triage,
        log: logAudit,
    });
    const triageService = new TriageService({ gateway, pipeline, store, log: logAudit });

    const app = createApp({
        triageService,
        mailAuth: mailAccount,
        log: logAudit,
        corsOrigins: config.corsOrigins,
        frontendRedirectUrl: config.frontendRedirectUrl,
    });
    return { app, db };
}

export function startServer(config: AppConfig = loadConfig()) {
    if (!config.tokenEncryptionKey) {
        logAudit("config_warning", { reason: "TOKEN_ENCRYPTION_KEY not set; using the local development key" });
    }
    if (!config.openai.apiKey) {
        logAudit("config_warning", { reason: "OPENAI_API_KEY not set; triage runs on deterministic fallbacks" });
    }

    const { app } = buildApp(config);
    return app.listen(config.port, () => {
        console.log(`Server running on http://localhost:${config.port}`);
    });
}

if (require.main === module) {
    startServer();
}
