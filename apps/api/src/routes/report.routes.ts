import { FastifyInstance } from "fastify";
import { parseCoachReportRequest } from "@spring-shop/shared";
import { generateCoachReport, prepareCoachReport } from "../coach-report";
import { DomainErrorCode, formatZodIssues, isDomainError, send400, send404, sendError } from "../errors";
import { listCoachNumbers } from "../failures";
import type { MasterDataCache } from "../master-data";
import type { SignatureImages } from "../report-document";
import {
  isUploadError,
  readSignatureImage,
  signatureRoleForField,
  UPLOAD_ERROR_DESCRIPTIONS,
  UploadErrorCode,
} from "../signature-upload";
import { springConfigurationEntries } from "../spring-config";

type CoachParams = { coachNo: string };

const PAYLOAD_FIELD = "payload";

const coachParamsSchema = {
  type: "object",
  required: ["coachNo"],
  additionalProperties: false,
  properties: {
    coachNo: { type: "string", minLength: 1, maxLength: 50 },
  },
};

const emptyQuerySchema = { type: "object", additionalProperties: false, properties: {} };

class ReportFormError extends Error {
  constructor(
    readonly code: string,
    message: string
  ) {
    super(message);
  }
}

function parsePayloadField(value: unknown): unknown {
  if (typeof value !== "string" || value.trim().length === 0) return {};
  try {
    return JSON.parse(value);
  } catch {
    throw new ReportFormError("INVALID_PAYLOAD_JSON", "The payload field must be a JSON object.");
  }
}

export async function registerCoachReportRoutes(app: FastifyInstance, masterData: MasterDataCache) {
  app.get("/api/v1/coaches", { schema: { querystring: emptyQuerySchema } }, async () => {
    return { coaches: await listCoachNumbers() };
  });

  // Everything the preparer needs to fill the report form for one coach.
  app.get<{ Params: CoachParams }>(
    "/api/v1/coaches/:coachNo/report-context",
    { schema: { params: coachParamsSchema, querystring: emptyQuerySchema } },
    async (request, reply) => {
      const context = await prepareCoachReport(request.params.coachNo, await masterData.get());
      if (!context) {
        return send404(reply, DomainErrorCode.COACH_NOT_FOUND, `No failure records for coach ${request.params.coachNo}`);
      }
      return {
        ...context,
        springConfiguration: springConfigurationEntries(context.springConfiguration),
      };
    }
  );

  /**
   * Multipart form: a JSON `payload` field (CoachReportRequest) plus optional
   * `shopSignature` and `inspectionSignature` PNG/JPEG files. Responds with the PDF.
   */
  app.post<{ Params: CoachParams }>(
    "/api/v1/coaches/:coachNo/report",
    {
      schema: { params: coachParamsSchema },
      config: { skipStrictMutationBodySchema: true },
    },
    async (request, reply) => {
      if (!request.isMultipart()) {
        return send400(reply, "MULTIPART_REQUIRED", "Send the report form as multipart/form-data.");
      }

      let payload: unknown = {};
      const images: SignatureImages = {};
      try {
        for await (const part of request.parts()) {
          if (part.type === "file") {
            const role = signatureRoleForField(part.fieldname);
            if (!role) {
              part.file.resume();
              throw new Error(UploadErrorCode.UNKNOWN_FILE_FIELD);
            }
            images[role] = await readSignatureImage(part);
          } else if (part.fieldname === PAYLOAD_FIELD) {
            payload = parsePayloadField(part.value);
          } else {
            throw new ReportFormError("UNKNOWN_FORM_FIELD", `Unexpected form field: ${part.fieldname}`);
          }
        }
      } catch (error) {
        if (error instanceof ReportFormError) {
          return send400(reply, error.code, error.message);
        }
        if (error instanceof Error && isUploadError(error.message)) {
          const statusCode = error.message === UploadErrorCode.FILE_TOO_LARGE ? 413 : 400;
          return sendError(reply, statusCode, error.message, UPLOAD_ERROR_DESCRIPTIONS[error.message]);
        }
        throw error;
      }

      const parsed = parseCoachReportRequest(payload);
      if (!parsed.success) {
        return send400(reply, "INVALID_REPORT_REQUEST", formatZodIssues(parsed.error));
      }

      const masterDataResult = await masterData.get();
      try {
        const report = await generateCoachReport(request.params.coachNo, parsed.data, masterDataResult, images);
        if (masterDataResult.error) {
          reply.header("x-master-data-warning", masterDataResult.error.replace(/[^\x20-\x7e]/g, " "));
        }
        reply.header("content-type", "application/pdf");
        reply.header("content-disposition", `attachment; filename="${report.fileName}"`);
        reply.header("cache-control", "no-store");
        return reply.send(report.buffer);
      } catch (error) {
        if (isDomainError(error, DomainErrorCode.COACH_NOT_FOUND)) {
          return send404(reply, DomainErrorCode.COACH_NOT_FOUND, `No failure records for coach ${request.params.coachNo}`);
        }
        throw error;
      }
    }
  );
}
