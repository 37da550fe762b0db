import crypto from "crypto";
import type { Credentials } from "google-auth-library";

type EncryptedEnvelope = {
    v: 1;
    alg: "aes-256-gcm";
    iv: string;
    tag: string;
    data: string;
};

export const LOCAL_DEV_ENCRYPTION_KEY = "local-dev-token-encryption-key";

function deriveAesKey(secret: string): Buffer {
    return crypto.createHash("sha256").update(secret).digest();
}

function isEncryptedEnvelope(value: unknown): value is EncryptedEnvelope {
    if (!value || typeof value !== "object") return false;
    return (
        "v" in value &&
        value.v === 1 &&
        "alg" in value &&
        value.alg === "aes-256-gcm" &&
        "iv" in value &&
        typeof value.iv === "string" &&
        "tag" in value &&
        typeof value.tag === "string" &&
        "data" in value &&
        typeof value.data === "string"
    );
}

export function encryptOAuthTokens(tokens: Credentials, secret: string): string {
    const iv = crypto.randomBytes(12);
    const cipher = crypto.createCipheriv("aes-256-gcm", deriveAesKey(secret), iv);
    const payload = JSON.stringify(tokens);
    const encrypted = Buffer.concat([cipher.update(payload, "utf-8"), cipher.final()]);
    const tag = cipher.getAuthTag();
    const envelope: EncryptedEnvelope = {
        v: 1,
        alg: "aes-256-gcm",
        iv: iv.toString("base64"),
        tag: tag.toString("base64"),
        data: encrypted.toString("base64"),
    };
    return JSON.stringify(envelope);
}

export function decryptOAuthTokens(encryptedPayload: string, secret: string): Credentials {
    const parsed: unknown = JSON.parse(encryptedPayload);
    if (!isEncryptedEnvelope(parsed)) {
        throw new Error("Stored mail token is not an encrypted envelope");
    }
    const decipher = crypto.createDecipheriv("aes-256-gcm", deriveAesKey(secret), Buffer.from(parsed.iv, "base64"));
    decipher.setAuthTag(Buffer.from(parsed.tag, "base64"));
    const decrypted = Buffer.concat([decipher.update(Buffer.from(parsed.data, "base64")), decipher.final()]);
    return JSON.parse(decrypted.toString("utf-8")) as Credentials;
}
