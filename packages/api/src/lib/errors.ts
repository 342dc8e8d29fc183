import type { FastifyInstance, FastifyError } from "fastify";
import fp from "fastify-plugin";
import { ZodError } from "zod";
import { WorkflowError, type WorkflowErrorCode } from "@caseflow/shared";

// ─── Workflow error code → HTTP status ──────────────────────────────

export const WORKFLOW_STATUS_MAP: Record<WorkflowErrorCode, number> = {
  NOT_FOUND: 404,
  INVALID_TOPOLOGY: 409,
  FORBIDDEN: 403,
  REQUIREMENTS_NOT_MET: 422,
  TERMINAL_STATE: 409,
  STALE_VERSION: 409,
  HAS_DEPENDENT_RECORDS: 409,
  VALIDATION_FAILED: 400,
};

function hasStatusCode(error: Error): error is FastifyError {
  return "statusCode" in error && typeof error.statusCode === "number";
}

// ─── Error handler plugin ───────────────────────────────────────────

async function errorHandler(app: FastifyInstance) {
  app.setErrorHandler((error: FastifyError | Error, request, reply) => {
    // Zod validation errors → 400
    if (error instanceof ZodError) {
      reply.status(400).send({
        error: "Validation Error",
        details: error.errors.map((e) => ({
          path: e.path.join("."),
          message: e.message,
        })),
      });
      return;
    }

    // Workflow errors → mapped status
    if (error instanceof WorkflowError) {
      reply.status(WORKFLOW_STATUS_MAP[error.code]).send({
        error: error.message,
        code: error.code,
        details: error.details,
      });
      return;
    }

    // Fastify validation errors (schema)
    if ("validation" in error && error.validation) {
      reply.status(400).send({
        error: "Validation Error",
        details: error.validation,
      });
      return;
    }

    // Unexpected errors
    const status = hasStatusCode(error) ? error.statusCode ?? 500 : 500;
    if (status >= 500) request.log.error({ err: error }, "unhandled error");
    reply.status(status).send({
      error: status >= 500 ? "Internal Server Error" : error.message,
    });
  });
}

export const errorHandlerPlugin = fp(errorHandler, {
  name: "error-handler",
});
