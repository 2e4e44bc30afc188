// Unit tests for HttpBackendClient against an in-process axios adapter

import { describe, it, expect } from "vitest";
import axios, { AxiosError, AxiosHeaders } from "axios";
import type { AxiosResponse, InternalAxiosRequestConfig } from "axios";
import { HttpBackendClient, toBackendError } from "./backend-client.js";
import { BackendRequestError } from "./errors.js";
import { makeFile } from "./test-helpers.js";

interface Route {
  status: number;
  body: unknown;
}

type Handler = (config: InternalAxiosRequestConfig) => Route;

/**
 * Builds a client whose axios instance answers from `handler` instead of the
 * network. Statuses >= 400 reject the way axios does.
 */
function clientWith(handler: Handler) {
  const requests: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    baseURL: "http://backend.test/api",
    adapter: async (config) => {
      requests.push(config);
      const route = handler(config);
      const response: AxiosResponse = {
        data: route.body,
        status: route.status,
        statusText: String(route.status),
        headers: {},
        config,
      };
      if (route.status >= 400) {
        throw new AxiosError(`Request failed with status code ${route.status}`, "ERR_BAD_RESPONSE", config, null, response);
      }
      return response;
    },
  });
  return { client: new HttpBackendClient({ baseUrl: "http://backend.test/api", http }), requests };
}

function jsonBody(config: InternalAxiosRequestConfig): unknown {
  return typeof config.data === "string" ? JSON.parse(config.data) : config.data;
}

describe("HttpBackendClient", () => {
  it("reads health status", async () => {
    const { client, requests } = clientWith(() => ({ status: 200, body: { status: "healthy", livekit_connected: true } }));
    await expect(client.checkHealth({ timeoutMs: 10_000 })).resolves.toEqual({ healthy: true, transportConnected: true });
    expect(requests[0].url).toBe("/health");
    expect(requests[0].timeout).toBe(10_000);
  });

  it("uploads both documents as multipart fields", async () => {
    const { client, requests } = clientWith(() => ({
      status: 200,
      body: { success: true, jd_full: "jd text", resume_full: "resume text" },
    }));

    const result = await client.upload(makeFile("jd.pdf"), makeFile("resume.pdf"));

    expect(result).toEqual({ jdText: "jd text", resumeText: "resume text" });
    const form = requests[0].data;
    expect(form).toBeInstanceOf(FormData);
    if (form instanceof FormData) {
      expect(form.has("jd_file")).toBe(true);
      expect(form.has("resume_file")).toBe(true);
    }
  });

  it("sends analyze and question requests with snake_case bodies", async () => {
    const { client, requests } = clientWith((config) =>
      config.url === "/analyze"
        ? { status: 200, body: { success: true, analysis: { score: 7 } } }
        : { status: 200, body: { success: true, questions: ["Q1?", "Q2?"] } },
    );

    await expect(client.analyze("jd", "cv")).resolves.toEqual({ score: 7 });
    await expect(client.generateQuestions("jd", "cv", 2)).resolves.toEqual(["Q1?", "Q2?"]);

    expect(jsonBody(requests[0])).toEqual({ jd_text: "jd", resume_text: "cv" });
    expect(jsonBody(requests[1])).toEqual({ jd_text: "jd", resume_text: "cv", num_questions: 2 });
  });

  it("rejects a question list that is not all strings", async () => {
    const { client } = clientWith(() => ({ status: 200, body: { success: true, questions: ["ok", 3] } }));
    await expect(client.generateQuestions("jd", "cv", 2)).rejects.toThrow("response is missing a question list");
  });

  it("maps the create-session payload", async () => {
    const { client, requests } = clientWith(() => ({
      status: 200,
      body: {
        success: true,
        data: {
          session_id: "abc12345-6789",
          room_name: "room-1",
          candidate_token: "test-token",
          livekit_url: "wss://rtc.example.test",
        },
      },
    }));

    const created = await client.createSession({
      candidateName: "Ada",
      position: "Engineer",
      email: "ada@example.test",
      questions: ["Q1?"],
      analysis: { score: 7 },
      jdText: "jd",
      resumeText: "cv",
    });

    expect(created).toEqual({
      sessionId: "abc12345-6789",
      roomName: "room-1",
      token: "test-token",
      transportUrl: "wss://rtc.example.test",
    });
    expect(jsonBody(requests[0])).toEqual({
      candidate_name: "Ada",
      position: "Engineer",
      email: "ada@example.test",
      questions: ["Q1?"],
      analysis: { score: 7 },
      jd_full: "jd",
      resume_full: "cv",
    });
  });

  it("surfaces the body error of an explicit failure", async () => {
    const { client } = clientWith(() => ({ status: 200, body: { success: false, error: "Unsupported file type" } }));
    const error = await client.upload(makeFile("jd.exe"), makeFile("cv.pdf")).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(BackendRequestError);
    if (error instanceof BackendRequestError) {
      expect(error.message).toBe("Unsupported file type");
      expect(error.serverMessage).toBe("Unsupported file type");
      expect(error.endpoint).toBe("upload");
    }
  });

  it("turns an error status into a BackendRequestError with the status", async () => {
    const { client } = clientWith(() => ({ status: 502, body: "<html>bad gateway</html>" }));
    const error = await client.analyze("jd", "cv").catch((err: unknown) => err);

    expect(error).toBeInstanceOf(BackendRequestError);
    if (error instanceof BackendRequestError) {
      expect(error.status).toBe(502);
      expect(error.message).toBe("HTTP 502");
      expect(error.serverMessage).toBeNull();
    }
  });

  it("reads the session status at the top level or under data", async () => {
    const top = clientWith(() => ({ status: 200, body: { success: true, session: { status: "completed" } } }));
    const nested = clientWith(() => ({ status: 200, body: { success: true, data: { session: { status: "interviewing" } } } }));

    await expect(top.client.getSessionStatus("s-1")).resolves.toBe("completed");
    await expect(nested.client.getSessionStatus("s-1")).resolves.toBe("interviewing");
    expect(top.requests[0].url).toBe("/session/s-1");
  });

  it("sends the status notice with a timestamp", async () => {
    const { client, requests } = clientWith(() => ({ status: 200, body: { success: true } }));
    await client.updateSessionStatus("s 1", "in-progress");

    expect(requests[0].method).toBe("put");
    expect(requests[0].url).toBe("/session/s%201");
    expect(jsonBody(requests[0])).toEqual({ status: "in-progress", connected_at: expect.any(String) });
  });

  it("reports dispatch outcomes without throwing on backend refusals", async () => {
    const ok = clientWith(() => ({ status: 200, body: { success: true, message: "queued" } }));
    const refused = clientWith(() => ({ status: 200, body: { success: false, message: "SMTP not configured" } }));
    const errorStatus = clientWith(() => ({ status: 500, body: { success: false, error: "Report not found" } }));

    await expect(ok.client.sendReport("s-1")).resolves.toEqual({ sent: true, message: "queued" });
    await expect(refused.client.sendReport("s-1")).resolves.toEqual({ sent: false, message: "SMTP not configured" });
    await expect(errorStatus.client.sendReport("s-1")).resolves.toEqual({ sent: false, message: "Report not found" });
    expect(ok.requests[0].url).toBe("/reports/s-1/send");
  });

  it("downloads the report as bytes", async () => {
    const bytes = new Uint8Array([37, 80, 68, 70]);
    const { client, requests } = clientWith(() => ({ status: 200, body: bytes.buffer }));

    await expect(client.fetchReport("s-1")).resolves.toEqual(bytes);
    expect(requests[0].responseType).toBe("arraybuffer");
  });
});

describe("toBackendError", () => {
  it("flags axios timeouts", () => {
    const config: InternalAxiosRequestConfig = { headers: new AxiosHeaders() };
    const error = toBackendError("analyze", new AxiosError("timeout of 10ms exceeded", "ECONNABORTED", config));
    expect(error.timedOut).toBe(true);
    expect(error.message).toBe("analyze timed out");
    expect(error.status).toBeNull();
  });

  it("keeps the message of a network failure", () => {
    const config: InternalAxiosRequestConfig = { headers: new AxiosHeaders() };
    const error = toBackendError("health", new AxiosError("connect ECONNREFUSED", "ECONNREFUSED", config));
    expect(error.timedOut).toBe(false);
    expect(error.message).toBe("connect ECONNREFUSED");
  });

  it("wraps non-axios errors", () => {
    expect(toBackendError("upload", new Error("disk")).message).toBe("disk");
    expect(toBackendError("upload", "odd").message).toBe("odd");
  });
});
