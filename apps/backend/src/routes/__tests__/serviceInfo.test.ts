import { afterEach, describe, expect, it } from "vitest";
import { FakeSegmenter } from "../../test/mocks/fakeSegmenter";
import { startTestServer, type TestServer } from "../../test/support/testServer";

describe("service info routes", () => {
  let server: TestServer | undefined;

  afterEach(async () => {
    await server?.close();
    server = undefined;
  });

  it("GET /health reports the service and model state", async () => {
    server = await startTestServer();
    const res = await fetch(`${server.baseUrl}/health`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      status: "healthy",
      service: "background-removal-api",
      segmenter: { model: "fake", status: "ready" },
    });
  });

  it("GET /health is degraded when the model failed to load", async () => {
    server = await startTestServer({}, new FakeSegmenter({ status: "failed" }));
    const res = await fetch(`${server.baseUrl}/health`);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: "degraded", segmenter: { status: "failed" } });
  });

  it("GET /api-info describes endpoints and limits", async () => {
    server = await startTestServer({ ALLOWED_EXTENSIONS: "png,jpg", RATE_LIMIT: "30 per minute" });
    const res = await fetch(`${server.baseUrl}/api-info`);
    const body: unknown = await res.json();

    expect(res.status).toBe(200);
    expect(body).toMatchObject({
      name: "Background Removal API",
      version: "1.0.0",
      supported_formats: ["png", "jpg"],
      limits: {
        max_file_size_bytes: 8388608,
        min_dimension: 100,
        max_width: 4000,
        max_height: 4000,
        max_processing_dimension: 2048,
        rate_limit: "30 per 60s",
      },
    });
    expect(body).toHaveProperty(["endpoints", "/remove-background", "method"], "POST");
  });

  it("answers CORS preflight requests", async () => {
    server = await startTestServer();
    const res = await fetch(`${server.baseUrl}/remove-background`, {
      method: "OPTIONS",
      headers: { Origin: "https://app.example", "Access-Control-Request-Method": "POST" },
    });

    expect(res.status).toBe(200);
    expect(res.headers.get("access-control-allow-origin")).toBe("*");
  });

  it("echoes only configured origins", async () => {
    server = await startTestServer({ CORS_ORIGINS: "https://app.example" });

    const allowed = await fetch(`${server.baseUrl}/health`, { headers: { Origin: "https://app.example" } });
    expect(allowed.headers.get("access-control-allow-origin")).toBe("https://app.example");

    const other = await fetch(`${server.baseUrl}/health`, { headers: { Origin: "https://evil.example" } });
    expect(other.headers.get("access-control-allow-origin")).toBeNull();
  });

  it("answers 404 as JSON for unknown routes", async () => {
    server = await startTestServer();
    const res = await fetch(`${server.baseUrl}/nope`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "NotFound", message: "Route not found" });
  });
});
