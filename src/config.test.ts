import { describe, it, expect } from "vitest";
import { DEFAULT_CONFIG, MAX_FILE_SIZE_BYTES, loadConfig } from "./config.js";

describe("DEFAULT_CONFIG", () => {
  it("carries the interview timing constants", () => {
    expect(DEFAULT_CONFIG.retry).toEqual({ maxAttempts: 3, baseDelayMs: 2000 });
    expect(DEFAULT_CONFIG.poll).toEqual({ intervalMs: 1000, maxAttempts: 30 });
    expect(DEFAULT_CONFIG.steps).toEqual({
      uploadMs: 30_000,
      analyzeMs: 45_000,
      generateQuestionsMs: 45_000,
      createSessionMs: 30_000,
    });
    expect(DEFAULT_CONFIG.connector.connectTimeoutMs).toBe(30_000);
    expect(DEFAULT_CONFIG.connector.publishTimeoutMs).toBe(15_000);
    expect(DEFAULT_CONFIG.validationDebounceMs).toBe(300);
    expect(MAX_FILE_SIZE_BYTES).toBe(10_485_760);
  });
});

describe("loadConfig", () => {
  it("returns the defaults for an empty environment", () => {
    const config = loadConfig({});
    expect(config.apiBaseUrl).toBe("http://localhost:5000/api");
    expect(config.reportDir).toBe("output");
    expect(config.questionCount).toBe(6);
    expect(config.retry).toEqual(DEFAULT_CONFIG.retry);
  });

  it("overlays INTERVIEW_* variables", () => {
    const config = loadConfig({
      INTERVIEW_API_URL: "https://interviews.example.test/api/",
      INTERVIEW_REPORT_DIR: "reports",
      INTERVIEW_QUESTION_COUNT: "4",
      INTERVIEW_CONNECT_MAX_ATTEMPTS: "5",
      INTERVIEW_CONNECT_RETRY_DELAY_MS: "250",
      INTERVIEW_STATUS_POLL_INTERVAL_MS: "500",
      INTERVIEW_STATUS_POLL_MAX_ATTEMPTS: "10",
    });

    expect(config.apiBaseUrl).toBe("https://interviews.example.test/api");
    expect(config.reportDir).toBe("reports");
    expect(config.questionCount).toBe(4);
    expect(config.retry).toEqual({ maxAttempts: 5, baseDelayMs: 250 });
    expect(config.poll).toEqual({ intervalMs: 500, maxAttempts: 10 });
  });

  it("treats blank variables as unset", () => {
    expect(loadConfig({ INTERVIEW_QUESTION_COUNT: "  " }).questionCount).toBe(6);
  });

  it("rejects a non-positive integer", () => {
    expect(() => loadConfig({ INTERVIEW_CONNECT_MAX_ATTEMPTS: "0" })).toThrow(
      'INTERVIEW_CONNECT_MAX_ATTEMPTS must be a positive integer, got "0"',
    );
    expect(() => loadConfig({ INTERVIEW_STATUS_POLL_INTERVAL_MS: "1.5" })).toThrow(
      'INTERVIEW_STATUS_POLL_INTERVAL_MS must be a positive integer, got "1.5"',
    );
  });

  it("rejects an unparseable API URL", () => {
    expect(() => loadConfig({ INTERVIEW_API_URL: "not a url" })).toThrow(
      'INTERVIEW_API_URL is not a valid URL: "not a url"',
    );
  });

  it("does not share nested objects with the defaults", () => {
    const config = loadConfig({});
    config.steps.uploadMs = 1;
    expect(DEFAULT_CONFIG.steps.uploadMs).toBe(30_000);
  });
});
