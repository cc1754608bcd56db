import { FastifyInstance } from "fastify";
import { summarizeFailures } from "../analytics";
import { listFailures } from "../failures";
import { parseFailureFilter, type FailureListQuery } from "./failure.routes";

const summaryQuerySchema = {
  type: "object",
  additionalProperties: false,
  properties: {
    coachNo: { type: "string", maxLength: 2000 },
    failureType: { type: "string", maxLength: 2000 },
    springType: { type: "string", maxLength: 2000 },
    coachType: { type: "string", maxLength: 200 },
  },
};

export async function registerDashboardRoutes(app: FastifyInstance) {
  // Same filters as the failure list, so the charts follow the table.
  app.get<{ Querystring: FailureListQuery }>(
    "/api/v1/dashboard/summary",
    { schema: { querystring: summaryQuerySchema } },
    async (request) => summarizeFailures(await listFailures(parseFailureFilter(request.query)))
  );
}
