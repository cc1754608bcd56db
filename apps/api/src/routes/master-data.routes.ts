import { FastifyInstance } from "fastify";
import type { MasterDataCache, MasterDataResult } from "../master-data";

const refreshBodySchema = {
  anyOf: [
    { type: "object", additionalProperties: false, properties: {} },
    { type: "null" },
  ],
};

function toPayload({ snapshot, error }: MasterDataResult) {
  return {
    springTypes: snapshot.springTypes,
    defectTypes: snapshot.defectTypes,
    visualActivities: snapshot.visualActivities,
    mustDoActivities: snapshot.mustDoActivities,
    inspectors: snapshot.inspectors,
    loadedAt: snapshot.loadedAt.toISOString(),
    error,
  };
}

export async function registerMasterDataRoutes(app: FastifyInstance, masterData: MasterDataCache) {
  app.get(
    "/api/v1/master-data",
    {
      schema: {
        querystring: { type: "object", additionalProperties: false, properties: {} },
      },
    },
    async () => toPayload(await masterData.get())
  );

  // Drops the cached snapshot and reloads; a failed reload is reported, not thrown.
  app.post(
    "/api/v1/master-data/refresh",
    { schema: { body: refreshBodySchema } },
    async () => toPayload(await masterData.refresh())
  );
}
