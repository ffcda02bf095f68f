import { afterAll, afterEach, vi } from "vitest";

// Provider credentials are placeholders; no test reaches a real backend.
process.env.ANTHROPIC_API_KEY = "test-secret";
process.env.AWS_REGION = "ap-northeast-2";

afterEach(() => {
  vi.clearAllMocks();
  vi.restoreAllMocks();
  vi.unstubAllGlobals();
  vi.unstubAllEnvs();
});

afterAll(() => {
  vi.resetAllMocks();
});
