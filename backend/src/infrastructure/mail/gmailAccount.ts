import { google } from "googleapis";
import type { Credentials } from "google-auth-library";
import { mergeTokensForPersistence } from "../../application/auth/authTokenPersistence";
import { TransportFailure } from "../../domain/errors";
import type { MailTokenRepository } from "../repositories/mailTokenRepository";

export const SCOPES = [
    "https://www.googleapis.com/auth/gmail.readonly",
    "https://www.googleapis.com/auth/gmail.send",
    "https://www.googleapis.com/auth/userinfo.email",
];

export type GmailOAuthConfig = {
    clientId?: string;
    clientSecret?: string;
    redirectUri: string;
};

export type GmailOAuthClient = InstanceType<typeof google.auth.OAuth2>;

export type MailAuthStatus = {
    authenticated: boolean;
    hasRefreshToken: boolean;
    accountEmail: string | null;
};

export interface MailAuthorizer {
    getAuthUrl(): string;
    completeAuthorization(code: string): Promise<{ accountEmail: string }>;
    status(): MailAuthStatus;
    disconnect(): void;
}

/** OAuth state for the connected Gmail mailbox. */
export class GmailAccount implements MailAuthorizer {
    constructor(
        private readonly config: GmailOAuthConfig,
        private readonly tokens: MailTokenRepository
    ) {}

    getAuthUrl(): string {
        return this.createOAuth2Client().generateAuthUrl({
            access_type: "offline",
            prompt: "consent",
            scope: SCOPES,
        });
    }

    async completeAuthorization(code: string): Promise<{ accountEmail: string }> {
        const client = this.createOAuth2Client();
        const { tokens } = await client.getToken(code);
        const merged = mergeTokensForPersistence({
            nextTokens: tokens,
            persistedTokens: this.tokens.find()?.tokens,
        });
        client.setCredentials(merged);

        const oauth2 = google.oauth2({ version: "v2", auth: client });
        const profile = await oauth2.userinfo.get();
        const accountEmail = profile.data.email ?? "";
        if (!accountEmail) {
            throw new Error("Google account email not available");
        }

        this.tokens.save(accountEmail, merged);
        return { accountEmail };
    }

    status(): MailAuthStatus {
        const stored = this.tokens.find();
        return {
            authenticated: Boolean(stored?.tokens.access_token || stored?.tokens.refresh_token),
            hasRefreshToken: Boolean(stored?.tokens.refresh_token),
            accountEmail: stored?.accountEmail ?? null,
        };
    }

    disconnect(): void {
        this.tokens.clear();
    }

    /**
     * Client carrying the stored credentials. Refreshed tokens are written
     * back so the next request does not refresh again.
     */
    authorizedClient(): GmailOAuthClient {
        const stored = this.tokens.find();
        if (!stored) {
            throw new TransportFailure("Mailbox is not authorized; complete /auth/google first");
        }

        const client = this.createOAuth2Client();
        client.setCredentials(stored.tokens);
        client.on("tokens", (next: Credentials) => {
            this.tokens.save(
                stored.accountEmail,
                mergeTokensForPersistence({ nextTokens: next, persistedTokens: stored.tokens })
            );
        });
        return client;
    }

    private createOAuth2Client(): GmailOAuthClient {
        const { clientId, clientSecret, redirectUri } = this.config;
        if (!clientId || !clientSecret) {
            throw new TransportFailure("GOOGLE_CLIENT_ID and GOOGLE_CLIENT_SECRET must be configured");
        }
        return new google.auth.OAuth2(clientId, clientSecret, redirectUri);
    }
}
