import { describe, expect, it } from "vitest";
import { TransportFailure } from "../../../src/domain/errors";
import { GmailAccount } from "../../../src/infrastructure/mail/gmailAccount";
import {
    GmailGateway,
    buildRawReply,
    extractPlainTextFromPayload,
    toInboundMessage,
} from "../../../src/infrastructure/mail/gmailGateway";
import { MailTokenRepository } from "../../../src/infrastructure/repositories/mailTokenRepository";
import { openDatabase } from "../../../src/infrastructure/sqlite";
import { recordingLogger } from "../../helpers/fakes";

function encoded(text: string): string {
    return Buffer.from(text, "utf-8").toString("base64url");
}

function decoded(raw: string): string {
    return Buffer.from(raw, "base64url").toString("utf-8");
}

describe("extractPlainTextFromPayload", () => {
    it("prefers the text/plain alternative", () => {
        const body = extractPlainTextFromPayload({
            mimeType: "multipart/alternative",
            parts: [
                { mimeType: "text/html", body: { data: encoded("<p>Html body</p>") } },
                { mimeType: "text/plain", body: { data: encoded("Plain body") } },
            ],
        });

        expect(body).toBe("Plain body");
    });

    it("descends into nested multiparts", () => {
        const body = extractPlainTextFromPayload({
            mimeType: "multipart/mixed",
            parts: [
                {
                    mimeType: "multipart/alternative",
                    parts: [{ mimeType: "text/plain", body: { data: encoded("Nested body") } }],
                },
                { mimeType: "application/pdf", filename: "invoice.pdf", body: { attachmentId: "att-1" } },
            ],
        });

        expect(body).toBe("Nested body");
    });

    it("returns an empty string when there is no text", () => {
        expect(extractPlainTextFromPayload(undefined)).toBe("");
        expect(extractPlainTextFromPayload({ mimeType: "multipart/mixed", parts: [] })).toBe("");
    });
});

describe("toInboundMessage", () => {
    it("maps headers case-insensitively and keeps the raw date", () => {
        const message = toInboundMessage({
            id: "m1",
            payload: {
                mimeType: "text/plain",
                headers: [
                    { name: "from", value: "Jane Doe <jane@example.com>" },
                    { name: "SUBJECT", value: "Need help" },
                    { name: "Date", value: "Mon, 4 Mar 2024 09:00:00 +0000" },
                ],
                body: { data: encoded("Hello team") },
            },
        });

        expect(message).toEqual({
            sender: "Jane Doe <jane@example.com>",
            subject: "Need help",
            body: "Hello team",
            sentDate: "Mon, 4 Mar 2024 09:00:00 +0000",
        });
    });

    it("uses empty strings for missing headers", () => {
        expect(toInboundMessage({ id: "m2" })).toEqual({ sender: "", subject: "", body: "", sentDate: "" });
    });
});

describe("buildRawReply", () => {
    it("builds a plain-text reply with a Re: subject", () => {
        expect(decoded(buildRawReply("jane@example.com", "Need help", "Hello"))).toBe(
            [
                "To: jane@example.com",
                "Subject: Re: Need help",
                "MIME-Version: 1.0",
                'Content-Type: text/plain; charset="UTF-8"',
                "Content-Transfer-Encoding: 8bit",
                "",
                "Hello",
            ].join("\r\n")
        );
    });

    it("keeps line breaks out of headers", () => {
        const raw = decoded(buildRawReply("jane@example.com\r\nBcc: other@example.com", "Hi\nthere", "Body"));

        expect(raw.split("\r\n").slice(0, 2)).toEqual([
            "To: jane@example.com Bcc: other@example.com",
            "Subject: Re: Hi there",
        ]);
    });

    it("encodes non-ASCII subjects", () => {
        const raw = decoded(buildRawReply("jane@example.com", "Hilfe für Konto", "Body"));
        const subjectLine = raw.split("\r\n")[1];

        expect(subjectLine).toBe(
            `Subject: =?UTF-8?B?${Buffer.from("Re: Hilfe für Konto", "utf-8").toString("base64")}?=`
        );
    });
});

describe("GmailGateway without an authorized mailbox", () => {
    const notAuthorized = () => {
        throw new TransportFailure("Mailbox is not authorized; complete /auth/google first");
    };

    it("returns no messages and logs the failure", async () => {
        const { log, entries } = recordingLogger();
        const gateway = new GmailGateway(notAuthorized, log);

        await expect(gateway.fetchSince(new Date("2024-03-01T00:00:00.000Z"))).resolves.toEqual([]);
        expect(entries).toEqual([
            {
                event: "mail_fetch_failed",
                fields: { reason: "Mailbox is not authorized; complete /auth/google first" },
            },
        ]);
    });

    it("reports an unsent reply", async () => {
        const { log, entries } = recordingLogger();
        const gateway = new GmailGateway(notAuthorized, log);

        await expect(gateway.send("jane@example.com", "Need help", "Hello")).resolves.toBe(false);
        expect(entries).toEqual([
            {
                event: "mail_send_failed",
                fields: {
                    recipient: "jane@example.com",
                    reason: "Mailbox is not authorized; complete /auth/google first",
                },
            },
        ]);
    });
});

describe("GmailAccount", () => {
    const config = {
        clientId: "test-client-id",
        clientSecret: "test-secret",
        redirectUri: "http://localhost:3000/oauth2callback",
    };

    it("reports status from the stored tokens", () => {
        const db = openDatabase(":memory:");
        const repo = new MailTokenRepository(db, "test-secret");
        const account = new GmailAccount(config, repo);

        expect(account.status()).toEqual({ authenticated: false, hasRefreshToken: false, accountEmail: null });

        repo.save("support@example.com", { access_token: "access-1", refresh_token: "refresh-1" });
        expect(account.status()).toEqual({
            authenticated: true,
            hasRefreshToken: true,
            accountEmail: "support@example.com",
        });

        account.disconnect();
        expect(account.status().authenticated).toBe(false);
        db.close();
    });

    it("refuses to build a client before authorization", () => {
        const db = openDatabase(":memory:");
        const account = new GmailAccount(config, new MailTokenRepository(db, "test-secret"));

        expect(() => account.authorizedClient()).toThrow(TransportFailure);
        db.close();
    });

    it("requests offline access for the mail scopes", () => {
        const db = openDatabase(":memory:");
        const account = new GmailAccount(config, new MailTokenRepository(db, "test-secret"));

        const url = new URL(account.getAuthUrl());

        expect(url.searchParams.get("access_type")).toBe("offline");
        expect(url.searchParams.get("client_id")).toBe("test-client-id");
        expect(url.searchParams.get("scope")).toContain("https://www.googleapis.com/auth/gmail.send");
        db.close();
    });

    it("requires client credentials", () => {
        const db = openDatabase(":memory:");
        const account = new GmailAccount({ redirectUri: config.redirectUri }, new MailTokenRepository(db, "test-secret"));

        expect(() => account.getAuthUrl()).toThrow("GOOGLE_CLIENT_ID and GOOGLE_CLIENT_SECRET must be configured");
        db.close();
    });
});
