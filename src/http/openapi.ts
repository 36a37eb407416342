import type { ServiceMetadata } from "../config/configManager.js";

export interface HealthResponse {
  readonly status: string;
  readonly message: string;
}

export interface DocsUrls {
  readonly docsUrl: string;
  readonly redocUrl: string;
  readonly openapiUrl: string;
}

export const API_PREFIX = "/api";

export const DOCS_URLS: DocsUrls = {
  docsUrl: `${API_PREFIX}/docs`,
  redocUrl: `${API_PREFIX}/redoc`,
  openapiUrl: `${API_PREFIX}/openapi.json`,
};

export const AVAILABLE_ENDPOINTS: readonly string[] = [
  `${API_PREFIX}/docs`,
  `${API_PREFIX}/redoc`,
  `${API_PREFIX}/openapi.json`,
  `${API_PREFIX}/swagger.json`,
  `${API_PREFIX}/health`,
  `${API_PREFIX}/debug/urls`,
];

export type OpenApiDocument = {
  readonly openapi: string;
  readonly info: ServiceMetadata;
  readonly paths: Record<string, Record<string, unknown>>;
  readonly components: { readonly schemas: Record<string, unknown> };
};

function jsonResponse(description: string, schema: Record<string, unknown>) {
  return {
    description,
    content: { "application/json": { schema } },
  };
}

const healthSchemaRef = { $ref: "#/components/schemas/HealthResponse" };

export function buildOpenApiDocument(metadata: ServiceMetadata): OpenApiDocument {
  return {
    openapi: "3.1.0",
    info: {
      title: metadata.title,
      description: metadata.description,
      version: metadata.version,
    },
    paths: {
      [`${API_PREFIX}/`]: {
        get: {
          summary: "Root",
          description: "Health check endpoint",
          operationId: "root_api__get",
          responses: { "200": jsonResponse("Successful Response", healthSchemaRef) },
        },
      },
      [`${API_PREFIX}/health`]: {
        get: {
          summary: "Health Check",
          description: "Detailed health check endpoint",
          operationId: "health_check_api_health_get",
          responses: { "200": jsonResponse("Successful Response", healthSchemaRef) },
        },
      },
      [`${API_PREFIX}/debug/urls`]: {
        get: {
          summary: "Debug Urls",
          description: "Debug endpoint to check configured URLs",
          operationId: "debug_urls_api_debug_urls_get",
          responses: { "200": jsonResponse("Successful Response", { type: "object" }) },
        },
      },
    },
    components: {
      schemas: {
        HealthResponse: {
          title: "HealthResponse",
          type: "object",
          properties: {
            status: { title: "Status", type: "string" },
            message: { title: "Message", type: "string" },
          },
          required: ["status", "message"],
        },
      },
    },
  };
}
