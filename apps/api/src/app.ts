import { randomUUID } from "node:crypto";
import Fastify, { FastifyInstance, FastifyRequest, FastifySchema } from "fastify";
import cors from "@fastify/cors";
import multipart from "@fastify/multipart";
import rateLimit from "@fastify/rate-limit";
import swagger from "@fastify/swagger";
import swaggerUi from "@fastify/swagger-ui";
import { SpanStatusCode, trace } from "@opentelemetry/api";
import { isTestRuntime, parseListEnv, parsePositiveIntEnv } from "./env";
import { send400, sendError } from "./errors";
import { logError } from "./logger";
import { setLogContext } from "./log-context";
import { MasterDataCache } from "./master-data";
import {
  getMetricsContentType,
  getMetricsSnapshot,
  recordHttpRequestMetric,
  updateDbPoolMetric,
} from "./observability/metrics";
import { registerCoachReportRoutes } from "./routes/report.routes";
import { registerDashboardRoutes } from "./routes/dashboard.routes";
import { registerFailureRoutes } from "./routes/failure.routes";
import { registerMasterDataRoutes } from "./routes/master-data.routes";

declare module "fastify" {
  interface FastifyContextConfig {
    /** Multipart routes validate their payload by hand and opt out of the body-schema guard. */
    skipStrictMutationBodySchema?: boolean;
    skipStrictReadSchema?: boolean;
  }
}

export interface BuildAppOptions {
  /** Shared master data holder; one is created from the environment when absent. */
  masterData?: MasterDataCache;
}

const DEFAULT_SIGNATURE_MAX_BYTES = 2 * 1024 * 1024;
const DEFAULT_MASTER_DATA_TTL_MS = 300_000;

const DEFAULT_API_SUCCESS_RESPONSE_SCHEMA = {
  type: "object",
  additionalProperties: true,
  description: "Generic success payload. Route-specific response schema is recommended.",
};

const DEFAULT_API_ERROR_RESPONSE_SCHEMA = {
  type: "object",
  required: ["error", "message", "statusCode"],
  additionalProperties: false,
  properties: {
    error: { type: "string" },
    message: { type: "string" },
    statusCode: { type: "integer", minimum: 400, maximum: 599 },
  },
};

const DEFAULT_API_ERROR_RESPONSE_STATUS_CODES = ["400", "404", "413", "429", "500", "503"] as const;

function isRecord(node: unknown): node is Record<string, unknown> {
  return typeof node === "object" && node !== null && !Array.isArray(node);
}

function normalizeRouteMethods(method: unknown): string[] {
  if (Array.isArray(method)) {
    return method.map((entry) => String(entry).toUpperCase());
  }
  if (method == null) return [];
  return [String(method).toUpperCase()];
}

function inferApiTag(url: string): string {
  if (url.startsWith("/api/v1/master-data")) return "master-data";
  if (url.startsWith("/api/v1/failures")) return "failures";
  if (url.startsWith("/api/v1/dashboard/")) return "dashboard";
  if (url.startsWith("/api/v1/coaches")) return "reports";
  return "api";
}

function inferOperationId(method: string, url: string): string {
  const cleanedPath = url
    .replace(/^\/+/, "")
    .replace(/\/+$/, "")
    .split("/")
    .filter(Boolean)
    .map((segment) => {
      if (segment.startsWith(":")) return `by_${segment.slice(1)}`;
      return segment.replace(/[^A-Za-z0-9]+/g, "_");
    })
    .join("_")
    .replace(/_+/g, "_")
    .replace(/^_+|_+$/g, "");
  return `${method.toLowerCase()}_${cleanedPath}` || `${method.toLowerCase()}_root`;
}

function ensureOpenApiContractDefaults(input: {
  schema: unknown;
  url: string;
  method: string;
}): Record<string, unknown> {
  const nextSchema: Record<string, unknown> = isRecord(input.schema) ? { ...input.schema } : {};

  if (!input.url.startsWith("/api/v1/")) {
    return nextSchema;
  }

  const currentOperationId = nextSchema.operationId;
  if (typeof currentOperationId !== "string" || currentOperationId.trim().length === 0) {
    nextSchema.operationId = inferOperationId(input.method, input.url);
  }

  const currentTags = nextSchema.tags;
  if (!Array.isArray(currentTags) || currentTags.length === 0) {
    nextSchema.tags = [inferApiTag(input.url)];
  }

  const responseSchemas: Record<string, unknown> = isRecord(nextSchema.response)
    ? { ...nextSchema.response }
    : {};
  const has2xx = Object.keys(responseSchemas).some((statusCode) => /^2\d\d$/.test(statusCode));
  if (!has2xx) {
    responseSchemas["200"] = DEFAULT_API_SUCCESS_RESPONSE_SCHEMA;
  }
  for (const statusCode of DEFAULT_API_ERROR_RESPONSE_STATUS_CODES) {
    if (!responseSchemas[statusCode]) {
      responseSchemas[statusCode] = DEFAULT_API_ERROR_RESPONSE_SCHEMA;
    }
  }
  nextSchema.response = responseSchemas;

  return nextSchema;
}

function routeLabelForMetrics(request: FastifyRequest): string {
  const routeUrl = request.routeOptions?.url;
  if (routeUrl) return routeUrl;
  const rawPath = request.url.split("?")[0];
  return rawPath || "UNKNOWN_ROUTE";
}

function isStrictObjectSchema(node: unknown): boolean {
  return isRecord(node) && node.type === "object" && node.additionalProperties === false;
}

function containsStrictObjectSchema(node: unknown): boolean {
  if (!isRecord(node)) return false;
  if (isStrictObjectSchema(node)) return true;
  const unionNodes = [node.anyOf, node.oneOf, node.allOf];
  return unionNodes.some(
    (entry) => Array.isArray(entry) && entry.some((item) => containsStrictObjectSchema(item))
  );
}

function hasStrictRouteSchemaSection(
  routeSchema: FastifySchema | undefined,
  section: "body" | "params" | "querystring"
): boolean {
  return containsStrictObjectSchema(routeSchema?.[section]);
}

const GET_ROUTES_REQUIRING_STRICT_QUERY_SCHEMA = new Set([
  "/api/v1/failures",
  "/api/v1/failures/export",
  "/api/v1/dashboard/summary",
]);

/** Build and return the Fastify app with all routes (no listen). Used by server and tests. */
export async function buildApp(logger = true, options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const testRuntime = isTestRuntime();
  const docsEnabled = process.env.ENABLE_API_DOCS === "true" || process.env.NODE_ENV !== "production";
  const requestTimeoutMs = parsePositiveIntEnv(process.env.REQUEST_TIMEOUT_MS, 30000);
  const signatureMaxBytes = parsePositiveIntEnv(process.env.SIGNATURE_MAX_BYTES, DEFAULT_SIGNATURE_MAX_BYTES);
  const masterData =
    options.masterData ??
    new MasterDataCache({
      ttlMs: parsePositiveIntEnv(process.env.MASTER_DATA_TTL_MS, DEFAULT_MASTER_DATA_TTL_MS),
    });

  const app = Fastify({
    logger,
    requestTimeout: requestTimeoutMs,
    requestIdHeader: "x-request-id",
    genReqId: (req) => {
      const incomingHeader = req.headers["x-request-id"];
      if (typeof incomingHeader === "string" && incomingHeader.trim().length > 0) {
        return incomingHeader.trim();
      }
      if (Array.isArray(incomingHeader) && incomingHeader[0]?.trim().length) {
        return incomingHeader[0].trim();
      }
      return randomUUID();
    },
    ajv: {
      customOptions: {
        // Keep unknown keys so strict schemas (additionalProperties: false)
        // return 400 instead of silently dropping fields.
        removeAdditional: false,
      },
    },
  });

  const requestStartedAtNs = new WeakMap<FastifyRequest, bigint>();

  app.addHook("onRequest", async (request, reply) => {
    requestStartedAtNs.set(request, process.hrtime.bigint());
    setLogContext({ requestId: request.id });
    reply.header("x-request-id", request.id);
    const activeSpan = trace.getActiveSpan();
    if (activeSpan) {
      activeSpan.setAttribute("request.id", request.id);
    }
  });

  app.addHook("onError", async (request, _reply, error) => {
    const activeSpan = trace.getActiveSpan();
    if (activeSpan) {
      activeSpan.recordException(error);
      activeSpan.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
    }
    setLogContext({ requestId: request.id });
  });

  app.addHook("onResponse", async (request, reply) => {
    setLogContext({ requestId: request.id });
    const startedAt = requestStartedAtNs.get(request);
    if (startedAt === undefined) return;
    const durationSeconds = Number(process.hrtime.bigint() - startedAt) / 1_000_000_000;
    recordHttpRequestMetric({
      method: request.method,
      route: routeLabelForMetrics(request),
      statusCode: reply.statusCode,
      durationSeconds,
    });
  });

  await app.register(swagger, {
    openapi: {
      info: {
        title: "Spring Shop Inspection API",
        description: "Spring failure records, dashboard aggregates and coach inspection reports.",
        version: "1.0.0",
      },
      tags: [
        { name: "health", description: "Service health and readiness" },
        { name: "master-data", description: "Spring types, defect codes, activities and inspectors" },
        { name: "failures", description: "Spring failure records, suggestions and CSV export" },
        { name: "dashboard", description: "Failure analytics" },
        { name: "reports", description: "Coach inspection report preparation and PDF generation" },
      ],
    },
    transform: ({ schema, url, route }) => {
      const methods = normalizeRouteMethods(route.method);
      const primaryMethod = methods[0] || "GET";
      const transformedSchema = ensureOpenApiContractDefaults({
        schema,
        url,
        method: primaryMethod,
      });
      return { schema: transformedSchema, url };
    },
  });

  if (docsEnabled) {
    await app.register(swaggerUi, {
      routePrefix: "/docs",
      uiConfig: {
        docExpansion: "list",
        deepLinking: false,
      },
      staticCSP: true,
      transformStaticCSP: (header) => header,
    });
  }

  app.setErrorHandler((error, _request, reply) => {
    if (error.validation) {
      const context = error.validationContext;
      const errorCode =
        context === "querystring"
          ? "INVALID_QUERY_PARAMS"
          : context === "params"
            ? "INVALID_PATH_PARAMS"
            : "INVALID_REQUEST_BODY";
      return reply.send(send400(reply, errorCode, error.message || "Request validation failed"));
    }
    // Never expose internal error details to clients
    logError("Unhandled request error", {
      message: error.message,
      stack: error.stack,
      statusCode: error.statusCode,
    });
    const statusCode = error.statusCode || 500;
    if (statusCode >= 500) {
      return reply.send(sendError(reply, 500, "INTERNAL_ERROR", "An unexpected error occurred"));
    }
    // For 4xx errors from Fastify itself (e.g. 404, 413), return a clean message
    return reply.send(sendError(reply, statusCode, error.code || "ERROR", error.message));
  });

  // Enforce strict body schema on all mutation routes by default.
  // Route authors can opt out with `config.skipStrictMutationBodySchema = true`
  // for non-JSON parsers like multipart, but must validate payload shape manually.
  app.addHook("onRoute", (routeOptions) => {
    const methods = normalizeRouteMethods(routeOptions.method);
    const isMutation = methods.some((method) => {
      return method !== "GET" && method !== "HEAD" && method !== "OPTIONS";
    });
    if (isMutation) {
      const skipStrictMutationGuard = Boolean(routeOptions.config?.skipStrictMutationBodySchema);
      if (!skipStrictMutationGuard && !hasStrictRouteSchemaSection(routeOptions.schema, "body")) {
        throw new Error(
          `[MUTATION_SCHEMA_REQUIRED] ${methods.join(",")} ${routeOptions.url} must define a strict body schema (additionalProperties=false object, optionally within anyOf/oneOf/allOf)`
        );
      }
      return;
    }

    if (!methods.includes("GET")) return;
    if (routeOptions.config?.skipStrictReadSchema) return;

    const routeHasPathParams = routeOptions.url.includes(":") || routeOptions.url.includes("*");
    if (routeHasPathParams && !hasStrictRouteSchemaSection(routeOptions.schema, "params")) {
      throw new Error(
        `[READ_PARAMS_SCHEMA_REQUIRED] GET ${routeOptions.url} must define a strict params schema (object + additionalProperties=false)`
      );
    }

    if (
      GET_ROUTES_REQUIRING_STRICT_QUERY_SCHEMA.has(routeOptions.url) &&
      !hasStrictRouteSchemaSection(routeOptions.schema, "querystring")
    ) {
      throw new Error(
        `[READ_QUERY_SCHEMA_REQUIRED] GET ${routeOptions.url} must define a strict querystring schema (object + additionalProperties=false)`
      );
    }
  });

  // CORS: require explicit allowed origins outside tests.
  const allowedOrigins = parseListEnv(process.env.ALLOWED_ORIGINS);
  if (allowedOrigins.length === 0 && !testRuntime) {
    throw new Error("FATAL: ALLOWED_ORIGINS must be set in non-test runtime");
  }
  await app.register(cors, { origin: allowedOrigins.length > 0 ? allowedOrigins : true });

  // Two signature images and one JSON payload field per report request.
  await app.register(multipart, {
    limits: { fileSize: signatureMaxBytes, files: 2, fields: 4 },
  });

  // Global rate limiting: default 100 req/min per IP (override via env for tests/load)
  await app.register(rateLimit, {
    max: parsePositiveIntEnv(process.env.RATE_LIMIT_MAX, 100),
    timeWindow: process.env.RATE_LIMIT_WINDOW || "1 minute",
  });

  app.get("/health", { schema: { tags: ["health"] } }, async () => {
    return { status: "ok" };
  });

  app.get("/ready", { schema: { tags: ["health"] } }, async (_request, reply) => {
    try {
      const { query: dbQuery } = await import("./db");
      await dbQuery("SELECT 1");
      return { status: "ok" };
    } catch {
      reply.code(503);
      return { status: "degraded", reason: "database_unreachable" };
    }
  });

  app.get(
    "/metrics",
    {
      schema: {
        tags: ["health"],
        querystring: {
          type: "object",
          additionalProperties: false,
          properties: {},
        },
      },
    },
    async (_request, reply) => {
      const { pool } = await import("./db");
      updateDbPoolMetric({
        totalClients: pool.totalCount,
        idleClients: pool.idleCount,
        waitingClients: pool.waitingCount,
      });
      reply.header("content-type", getMetricsContentType());
      reply.header("cache-control", "no-store");
      return getMetricsSnapshot();
    }
  );

  await registerMasterDataRoutes(app, masterData);
  await registerFailureRoutes(app);
  await registerDashboardRoutes(app);
  await registerCoachReportRoutes(app, masterData);

  if (docsEnabled) {
    app.get("/api/v1/openapi.json", async (_request, reply) => {
      reply.header("cache-control", "no-store");
      return app.swagger();
    });
  }

  return app;
}
