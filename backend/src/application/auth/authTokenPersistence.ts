import type { Credentials } from "google-auth-library";

/**
 * Google only returns a refresh token on first consent; keep the one we
 * already have when a refresh or re-consent omits it.
 */
export function mergeTokensForPersistence(params: {
    nextTokens: Credentials;
    persistedTokens?: Credentials | null;
}): Credentials {
    const { nextTokens, persistedTokens } = params;
    const existingRefreshToken = nextTokens.refresh_token ?? persistedTokens?.refresh_token;

    return {
        ...persistedTokens,
        ...nextTokens,
        ...(existingRefreshToken ? { refresh_token: existingRefreshToken } : {}),
    };
}
