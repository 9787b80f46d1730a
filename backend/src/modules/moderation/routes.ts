import type { FastifyInstance } from "fastify";
import type { ModerationConfig } from "../../libs/config.js";
import type { DecisionLogger } from "../../libs/decisionLog.js";
import { validationError } from "../../libs/errors.js";
import { classifyMessage } from "./classify.js";

export type ModerationModuleDeps = {
  decisionLog: DecisionLogger;
  moderation: ModerationConfig;
};

export async function registerModerationRoutes(app: FastifyInstance, deps: ModerationModuleDeps) {
  app.post<{ Body: { message: string } }>(
    "/moderate",
    {
      schema: {
        body: {
          type: "object",
          required: ["message"],
          properties: { message: { type: "string" } },
        },
      },
    },
    async (req) => {
      const { message } = req.body;
      if (message.trim() === "") {
        throw validationError("message must not be empty");
      }
      const result = classifyMessage(message, deps.moderation);
      req.log.info({ status: result.status }, "Message moderated");
      deps.decisionLog.append({ kind: "moderation", input: { message }, output: result });
      return result;
    },
  );
}
