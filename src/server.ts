import cors from "cors";
import express, {
  Router,
  type Express,
  type NextFunction,
  type Request,
  type Response,
} from "express";

import { renderRedocPage, renderSwaggerUiPage } from "./http/docsPages.js";
import {
  API_PREFIX,
  AVAILABLE_ENDPOINTS,
  DOCS_URLS,
  buildOpenApiDocument,
  type HealthResponse,
} from "./http/openapi.js";
import type { AppContext } from "./runtime/serviceRegistry.js";
import { describeError } from "./telemetry/logger.js";

export function createServer(context: AppContext): Express {
  const { config, logger } = context;
  const { service, publicPathPrefix } = config;
  const openapiDocument = buildOpenApiDocument(service);
  const publicOpenapiUrl = `${publicPathPrefix}${DOCS_URLS.openapiUrl}`;

  const app = express();
  app.disable("x-powered-by");
  app.use(
    cors({
      origin: true,
      credentials: true,
    }),
  );

  const api = Router();

  api.get("/", (_req: Request, res: Response) => {
    const body: HealthResponse = {
      status: "healthy",
      message: `${service.title} is running`,
    };
    res.json(body);
  });

  api.get("/health", (_req: Request, res: Response) => {
    const body: HealthResponse = {
      status: "healthy",
      message: `Service is running. ${service.title} ready.`,
    };
    res.json(body);
  });

  api.get("/debug/urls", (_req: Request, res: Response) => {
    res.json({
      docs_url: DOCS_URLS.docsUrl,
      redoc_url: DOCS_URLS.redocUrl,
      openapi_url: DOCS_URLS.openapiUrl,
      root_path: publicPathPrefix,
      available_endpoints: AVAILABLE_ENDPOINTS,
    });
  });

  const sendOpenApi = (_req: Request, res: Response) => {
    res.json(openapiDocument);
  };
  api.get("/openapi.json", sendOpenApi);
  api.get("/swagger.json", sendOpenApi);

  api.get("/docs", (_req: Request, res: Response) => {
    res.type("html").send(renderSwaggerUiPage({ title: service.title, openapiUrl: publicOpenapiUrl }));
  });

  api.get("/redoc", (_req: Request, res: Response) => {
    res.type("html").send(renderRedocPage({ title: service.title, openapiUrl: publicOpenapiUrl }));
  });

  app.use(API_PREFIX, api);

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ detail: "Not Found" });
  });

  // Express only treats four-argument middleware as an error handler.
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    logger.error("Unhandled request error", {
      method: req.method,
      path: req.originalUrl,
      error: describeError(error),
    });
    res.status(500).json({ detail: "Internal Server Error" });
  });

  return app;
}
