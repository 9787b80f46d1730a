import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from "fastify";

export type AppErrorCode = "NOT_FOUND" | "VALIDATION_ERROR" | "INTERNAL";

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: AppErrorCode;
  public readonly details?: unknown;

  constructor(opts: { statusCode: number; code: AppErrorCode; message: string; details?: unknown }) {
    super(opts.message);
    this.name = "AppError";
    this.statusCode = opts.statusCode;
    this.code = opts.code;
    this.details = opts.details;
  }
}

export function notFound(message: string): AppError {
  return new AppError({ statusCode: 404, code: "NOT_FOUND", message });
}

export function validationError(message: string, details?: unknown): AppError {
  return new AppError({ statusCode: 400, code: "VALIDATION_ERROR", message, details });
}

export function assertUnreachable(x: never): never {
  throw new AppError({ statusCode: 500, code: "INTERNAL", message: `Unreachable: ${String(x)}` });
}

export function setErrorHandler(app: FastifyInstance) {
  app.setErrorHandler((err: FastifyError | AppError, req: FastifyRequest, reply: FastifyReply) => {
    const requestId = req.id;

    // Fastify schema validation error
    if ("validation" in err && err.validation) {
      reply.status(400).send({
        requestId,
        error: { code: "VALIDATION_ERROR", message: err.message, details: err.validation },
      });
      return;
    }

    if (err instanceof AppError) {
      reply.status(err.statusCode).send({
        requestId,
        error: { code: err.code, message: err.message, details: err.details },
      });
      return;
    }

    // Malformed JSON bodies, unsupported media types and the like
    if (typeof err.statusCode === "number" && err.statusCode >= 400 && err.statusCode < 500) {
      reply.status(400).send({
        requestId,
        error: { code: "VALIDATION_ERROR", message: err.message },
      });
      return;
    }

    req.log.error({ err }, "Unhandled error");
    reply.status(500).send({
      requestId,
      error: { code: "INTERNAL", message: "Internal server error" },
    });
  });
}
