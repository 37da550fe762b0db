/**
 * Global test setup for Vitest.
 *
 * Clears credentials so nothing reaches OpenAI or Google, and restores
 * spies between tests.
 */

import { afterEach, vi } from "vitest";

process.env.NODE_ENV = "test";
process.env.OPENAI_API_KEY = "";
process.env.TOKEN_ENCRYPTION_KEY = "test-secret";

afterEach(() => {
    vi.restoreAllMocks();
});
