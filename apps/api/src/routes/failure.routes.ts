import { FastifyInstance } from "fastify";
import { SpringFailureInputSchema, SpringFailureUpdateSchema } from "@spring-shop/shared";
import type { SpringFailureFilter } from "@spring-shop/shared";
import { parseListEnv } from "../env";
import { DomainErrorCode, formatZodIssues, isDomainError, send400, send404 } from "../errors";
import * as failures from "../failures";

export type FailureListQuery = {
  coachNo?: string;
  failureType?: string;
  springType?: string;
  coachType?: string;
};

type FailureIdParams = { id: string };
type SuggestionParams = { column: string };

const filterQuerySchema = {
  type: "object",
  additionalProperties: false,
  properties: {
    coachNo: { type: "string", maxLength: 2000 },
    failureType: { type: "string", maxLength: 2000 },
    springType: { type: "string", maxLength: 2000 },
    coachType: { type: "string", maxLength: 200 },
  },
};

const failureIdParamsSchema = {
  type: "object",
  required: ["id"],
  additionalProperties: false,
  properties: {
    id: { type: "string", format: "uuid" },
  },
};

const suggestionParamsSchema = {
  type: "object",
  required: ["column"],
  additionalProperties: false,
  properties: {
    column: { type: "string", minLength: 1, maxLength: 64 },
  },
};

const nullableText = { type: ["string", "null"], maxLength: 500 };

const failureCreateBodySchema = {
  type: "object",
  required: ["coachNo", "coachType", "receiptDate"],
  additionalProperties: false,
  properties: {
    coachNo: { type: "string", minLength: 1, maxLength: 50 },
    coachType: { type: "string", enum: ["VB", "LHB"] },
    coachCode: nullableText,
    schedule: nullableText,
    division: nullableText,
    bogieNumber: nullableText,
    receiptDate: { type: "string", maxLength: 10 },
    secondarySuspensionType: nullableText,
    springType: nullableText,
    springColour: nullableText,
    failureType: nullableText,
    location: nullableText,
    locationInBogie: nullableText,
    remarks: { type: ["string", "null"], maxLength: 2000 },
    mfg: nullableText,
    defectCount: { type: "integer", minimum: 1 },
  },
};

const failureUpdateBodySchema = {
  type: "object",
  additionalProperties: false,
  properties: {
    coachNo: { type: "string", minLength: 1, maxLength: 50 },
    coachType: { type: "string", enum: ["VB", "LHB"] },
    bogieNumber: nullableText,
    springType: { type: "string", maxLength: 500 },
    springColour: { type: "string", maxLength: 500 },
    secondarySuspensionType: { type: "string", maxLength: 500 },
    failureType: { type: "string", maxLength: 500 },
    location: nullableText,
    locationInBogie: nullableText,
    remarks: { type: ["string", "null"], maxLength: 2000 },
  },
};

const deleteBodySchema = {
  anyOf: [
    { type: "object", additionalProperties: false, properties: {} },
    { type: "null" },
  ],
};

/** Comma-separated query values, trimmed, blanks dropped; absent when empty. */
export function parseFailureFilter(query: FailureListQuery): SpringFailureFilter {
  const filter: SpringFailureFilter = {};
  const coachNos = parseListEnv(query.coachNo);
  const failureTypes = parseListEnv(query.failureType);
  const springTypes = parseListEnv(query.springType);
  const coachTypes = parseListEnv(query.coachType);
  if (coachNos.length > 0) filter.coachNos = coachNos;
  if (failureTypes.length > 0) filter.failureTypes = failureTypes;
  if (springTypes.length > 0) filter.springTypes = springTypes;
  if (coachTypes.length > 0) filter.coachTypes = coachTypes;
  return filter;
}

export async function registerFailureRoutes(app: FastifyInstance) {
  app.get<{ Querystring: FailureListQuery }>(
    "/api/v1/failures",
    { schema: { querystring: filterQuerySchema } },
    async (request) => {
      const rows = await failures.listFailures(parseFailureFilter(request.query));
      return { failures: rows, total: rows.length };
    }
  );

  app.get<{ Querystring: FailureListQuery }>(
    "/api/v1/failures/export",
    { schema: { querystring: filterQuerySchema } },
    async (request, reply) => {
      const stream = await failures.exportFailuresToCSV(parseFailureFilter(request.query));
      reply.header("content-type", "text/csv; charset=utf-8");
      reply.header("content-disposition", `attachment; filename="${failures.csvFileName()}"`);
      reply.header("cache-control", "no-store");
      return reply.send(stream);
    }
  );

  app.get<{ Params: SuggestionParams }>(
    "/api/v1/failures/suggestions/:column",
    { schema: { params: suggestionParamsSchema } },
    async (request, reply) => {
      try {
        const values = await failures.getDistinctValues(request.params.column);
        return { column: request.params.column, values };
      } catch (error) {
        if (isDomainError(error, DomainErrorCode.INVALID_SUGGESTION_COLUMN)) {
          return send400(
            reply,
            DomainErrorCode.INVALID_SUGGESTION_COLUMN,
            `Suggestions are available for: ${failures.SUGGESTION_COLUMNS.join(", ")}`
          );
        }
        throw error;
      }
    }
  );

  app.get<{ Params: FailureIdParams }>(
    "/api/v1/failures/:id",
    { schema: { params: failureIdParamsSchema } },
    async (request, reply) => {
      const failure = await failures.getFailureById(request.params.id);
      if (!failure) return send404(reply, DomainErrorCode.FAILURE_NOT_FOUND);
      return failure;
    }
  );

  app.post<{ Body: unknown }>(
    "/api/v1/failures",
    { schema: { body: failureCreateBodySchema } },
    async (request, reply) => {
      const parsed = SpringFailureInputSchema.safeParse(request.body);
      if (!parsed.success) {
        return send400(reply, "INVALID_REQUEST_BODY", formatZodIssues(parsed.error));
      }
      const failure = await failures.createFailure(parsed.data);
      reply.code(201);
      return failure;
    }
  );

  app.patch<{ Params: FailureIdParams; Body: unknown }>(
    "/api/v1/failures/:id",
    { schema: { params: failureIdParamsSchema, body: failureUpdateBodySchema } },
    async (request, reply) => {
      const parsed = SpringFailureUpdateSchema.safeParse(request.body);
      if (!parsed.success) {
        return send400(reply, "INVALID_REQUEST_BODY", formatZodIssues(parsed.error));
      }
      try {
        return await failures.updateFailure(request.params.id, parsed.data);
      } catch (error) {
        if (isDomainError(error, DomainErrorCode.FAILURE_NOT_FOUND)) {
          return send404(reply, DomainErrorCode.FAILURE_NOT_FOUND);
        }
        throw error;
      }
    }
  );

  app.delete<{ Params: FailureIdParams }>(
    "/api/v1/failures/:id",
    { schema: { params: failureIdParamsSchema, body: deleteBodySchema } },
    async (request, reply) => {
      try {
        await failures.deleteFailure(request.params.id);
        return { deleted: true, id: request.params.id };
      } catch (error) {
        if (isDomainError(error, DomainErrorCode.FAILURE_NOT_FOUND)) {
          return send404(reply, DomainErrorCode.FAILURE_NOT_FOUND);
        }
        throw error;
      }
    }
  );
}
