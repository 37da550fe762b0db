import { google } from "googleapis";
import type { gmail_v1 } from "googleapis";
import { TransportFailure, errorMessage } from "../../domain/errors";
import type { AuditLogger, InboundMessage, MailGateway } from "../../domain/triage/types";
import { runBatch } from "../../utils/async";
import type { GmailOAuthClient } from "./gmailAccount";

const LIST_PAGE_SIZE = 100;
const DETAIL_CONCURRENCY = 10;

export function getHeaderValue(headers: gmail_v1.Schema$MessagePartHeader[] | undefined, name: string): string {
    return headers?.find((h) => h.name?.toLowerCase() === name.toLowerCase())?.value ?? "";
}

function decodeBase64Url(input: string): string {
    const normalized = input.replace(/-/g, "+").replace(/_/g, "/");
    return Buffer.from(normalized, "base64").toString("utf-8");
}

export function extractPlainTextFromPayload(payload: gmail_v1.Schema$MessagePart | undefined): string {
    if (!payload) return "";

    if (payload.mimeType === "text/plain" && payload.body?.data) {
        return decodeBase64Url(payload.body.data);
    }

    const parts = payload.parts ?? [];
    for (const part of parts) {
        if (part.mimeType !== "text/plain") {
            continue;
        }
        const nested = extractPlainTextFromPayload(part);
        if (nested.trim().length > 0) {
            return nested;
        }
    }

    for (const part of parts) {
        const nested = extractPlainTextFromPayload(part);
        if (nested.trim().length > 0) {
            return nested;
        }
    }

    if (payload.body?.data) {
        return decodeBase64Url(payload.body.data);
    }

    return "";
}

function stripLineBreaks(value: string): string {
    return value.replace(/[\r\n]+/g, " ").trim();
}

function encodeHeaderWord(value: string): string {
    return /^[\x20-\x7e]*$/.test(value) ? value : `=?UTF-8?B?${Buffer.from(value, "utf-8").toString("base64")}?=`;
}

export function replySubject(subject: string): string {
    return `Re: ${subject}`;
}

/** RFC 2822 plain-text message, base64url-encoded for `users.messages.send`. */
export function buildRawReply(to: string, subject: string, body: string): string {
    const message = [
        `To: ${stripLineBreaks(to)}`,
        `Subject: ${encodeHeaderWord(stripLineBreaks(replySubject(subject)))}`,
        "MIME-Version: 1.0",
        'Content-Type: text/plain; charset="UTF-8"',
        "Content-Transfer-Encoding: 8bit",
        "",
        body,
    ].join("\r\n");
    return Buffer.from(message, "utf-8").toString("base64url");
}

export function toInboundMessage(message: gmail_v1.Schema$Message): InboundMessage {
    const headers = message.payload?.headers;
    return {
        sender: getHeaderValue(headers, "From"),
        subject: getHeaderValue(headers, "Subject"),
        body: extractPlainTextFromPayload(message.payload),
        sentDate: getHeaderValue(headers, "Date"),
    };
}

export class GmailGateway implements MailGateway {
    constructor(
        private readonly authorize: () => GmailOAuthClient,
        private readonly log: AuditLogger,
        private readonly maxMessages = 200
    ) {}

    async fetchSince(since: Date): Promise<InboundMessage[]> {
        try {
            const gmail = this.client();
            const ids = await this.listMessageIds(gmail, `in:inbox after:${Math.floor(since.getTime() / 1000)}`);
            // Gmail lists newest first; triage expects arrival order.
            const oldestFirst = [...ids].reverse();
            return await runBatch(
                oldestFirst,
                async (id) => {
                    const msg = await gmail.users.messages.get({ userId: "me", id, format: "full" });
                    return toInboundMessage(msg.data);
                },
                DETAIL_CONCURRENCY
            );
        } catch (err) {
            const failure =
                err instanceof TransportFailure
                    ? err
                    : new TransportFailure(`Gmail fetch failed: ${errorMessage(err)}`, { cause: err });
            this.log("mail_fetch_failed", { reason: failure.message });
            return [];
        }
    }

    async send(to: string, subject: string, body: string): Promise<boolean> {
        try {
            const gmail = this.client();
            await gmail.users.messages.send({
                userId: "me",
                requestBody: { raw: buildRawReply(to, subject, body) },
            });
            return true;
        } catch (err) {
            const failure =
                err instanceof TransportFailure
                    ? err
                    : new TransportFailure(`Gmail send failed: ${errorMessage(err)}`, { cause: err });
            this.log("mail_send_failed", { recipient: to, reason: failure.message });
            return false;
        }
    }

    private client(): gmail_v1.Gmail {
        return google.gmail({ version: "v1", auth: this.authorize() });
    }

    private async listMessageIds(gmail: gmail_v1.Gmail, q: string): Promise<string[]> {
        const ids: string[] = [];
        let pageToken: string | undefined;
        do {
            const list = await gmail.users.messages.list({
                userId: "me",
                q,
                maxResults: LIST_PAGE_SIZE,
                pageToken,
            });
            for (const message of list.data.messages ?? []) {
                if (message.id) {
                    ids.push(message.id);
                }
            }
            pageToken = list.data.nextPageToken ?? undefined;
        } while (pageToken && ids.length < this.maxMessages);
        return ids.slice(0, this.maxMessages);
    }
}
