import express, { type NextFunction, type Request, type Response } from "express";
import requestFactory from "supertest";
import { beforeAll, describe, expect, it } from "vitest";

import { ConfigManager } from "../../src/config/configManager.js";
import type { AppContext } from "../../src/runtime/serviceRegistry.js";
import { createServer } from "../../src/server.js";
import { RecordingLogger } from "../helpers/recordingLogger.js";

function contextFor(env: NodeJS.ProcessEnv = {}, logger = new RecordingLogger()): AppContext {
  return {
    config: new ConfigManager(env).getServiceConfig(),
    youtubeApiKey: { value: "test-secret", source: "environment", attempts: [] },
    logger,
  };
}

describe("API service contracts", () => {
  let request: ReturnType<typeof requestFactory>;

  beforeAll(() => {
    request = requestFactory(createServer(contextFor()));
  });

  it("reports the service as running on the api root", async () => {
    const response = await request.get("/api/");

    expect(response.status).toBe(200);
    expect(response.body).toStrictEqual({
      status: "healthy",
      message: "YouTube Transcript API is running",
    });
  });

  it("serves the detailed health check", async () => {
    const response = await request.get("/api/health");

    expect(response.status).toBe(200);
    expect(response.body).toStrictEqual({
      status: "healthy",
      message: "Service is running. YouTube Transcript API ready.",
    });
  });

  it("never exposes the resolved secret", async () => {
    const responses = await Promise.all(
      ["/api/", "/api/health", "/api/debug/urls", "/api/openapi.json"].map((url) => request.get(url)),
    );
    responses.forEach((response) => {
      expect(response.text).not.toContain("test-secret");
    });
  });

  it("lists the configured documentation urls", async () => {
    const response = await request.get("/api/debug/urls");

    expect(response.status).toBe(200);
    expect(response.body).toStrictEqual({
      docs_url: "/api/docs",
      redoc_url: "/api/redoc",
      openapi_url: "/api/openapi.json",
      root_path: "/yt",
      available_endpoints: [
        "/api/docs",
        "/api/redoc",
        "/api/openapi.json",
        "/api/swagger.json",
        "/api/health",
        "/api/debug/urls",
      ],
    });
  });

  it("serves the OpenAPI document on both paths", async () => {
    const openapi = await request.get("/api/openapi.json");
    const swagger = await request.get("/api/swagger.json");

    expect(openapi.status).toBe(200);
    expect(openapi.body.openapi).toBe("3.1.0");
    expect(openapi.body.info).toStrictEqual({
      title: "YouTube Transcript API",
      description: "API to fetch YouTube video transcripts with Azure Key Vault integration",
      version: "1.0.0",
    });
    expect(Object.keys(openapi.body.paths)).toStrictEqual(["/api/", "/api/health", "/api/debug/urls"]);
    expect(openapi.body.components.schemas.HealthResponse.required).toStrictEqual(["status", "message"]);
    expect(swagger.status).toBe(200);
    expect(swagger.body).toStrictEqual(openapi.body);
  });

  it("renders Swagger UI against the public OpenAPI url", async () => {
    const response = await request.get("/api/docs");

    expect(response.status).toBe(200);
    expect(response.headers["content-type"]).toBe("text/html; charset=utf-8");
    expect(response.text).toContain('url: "/yt/api/openapi.json",');
    expect(response.text).toContain("<title>YouTube Transcript API - Swagger UI</title>");
  });

  it("renders ReDoc against the public OpenAPI url", async () => {
    const response = await request.get("/api/redoc");

    expect(response.status).toBe(200);
    expect(response.headers["content-type"]).toBe("text/html; charset=utf-8");
    expect(response.text).toContain('<redoc spec-url="/yt/api/openapi.json"></redoc>');
    expect(response.text).toContain("<title>YouTube Transcript API - ReDoc</title>");
  });

  it("answers unknown routes with a JSON 404", async () => {
    const response = await request.get("/api/transcripts/abc");

    expect(response.status).toBe(404);
    expect(response.body).toStrictEqual({ detail: "Not Found" });
  });

  it("allows credentialed cross-origin requests from any origin", async () => {
    const response = await request.get("/api/health").set("Origin", "https://portal.example.test");

    expect(response.headers["access-control-allow-origin"]).toBe("https://portal.example.test");
    expect(response.headers["access-control-allow-credentials"]).toBe("true");
  });

  it("answers CORS preflight requests", async () => {
    const response = await request
      .options("/api/health")
      .set("Origin", "https://portal.example.test")
      .set("Access-Control-Request-Method", "DELETE")
      .set("Access-Control-Request-Headers", "x-request-id");

    expect(response.status).toBe(204);
    expect(response.headers["access-control-allow-origin"]).toBe("https://portal.example.test");
    expect(response.headers["access-control-allow-methods"]).toBe("GET,HEAD,PUT,PATCH,POST,DELETE");
    expect(response.headers["access-control-allow-headers"]).toBe("x-request-id");
  });

  it("uses the configured public path prefix in the docs pages", async () => {
    const local = requestFactory(createServer(contextFor({ PUBLIC_PATH_PREFIX: "/" })));

    const docs = await local.get("/api/docs");
    const urls = await local.get("/api/debug/urls");

    expect(docs.text).toContain('url: "/api/openapi.json",');
    expect(urls.body.root_path).toBe("");
  });

  it("turns an error raised inside a route into a logged JSON 500", async () => {
    const logger = new RecordingLogger();
    const outer = express();
    // The first res.json call throws, as a failing serializer would.
    outer.use((_req: Request, res: Response, next: NextFunction) => {
      const send = res.json.bind(res);
      let failed = false;
      res.json = (body?: unknown) => {
        if (!failed) {
          failed = true;
          throw new Error("serializer exploded");
        }
        return send(body);
      };
      next();
    });
    outer.use(createServer(contextFor({}, logger)));

    const response = await requestFactory(outer).get("/api/health");

    expect(response.status).toBe(500);
    expect(response.body).toStrictEqual({ detail: "Internal Server Error" });
    expect(logger.entries).toStrictEqual([
      {
        level: "error",
        message: "Unhandled request error",
        metadata: { method: "GET", path: "/api/health", error: "serializer exploded" },
      },
    ]);
  });
});
