import type { FastifyInstance } from "fastify";
import { registerModerationRoutes, type ModerationModuleDeps } from "./routes.js";

export { classifyMessage, MODERATION_RULES } from "./classify.js";
export { rulePhoneNumber, ruleAbusive, ruleSpam, phrasePattern } from "./rules.js";
export { MODERATION_STATUSES } from "./types.js";
export type { ModerationResult, ModerationStatus } from "./types.js";
export type { ModerationModuleDeps } from "./routes.js";

export async function registerModerationModule(app: FastifyInstance, deps: ModerationModuleDeps) {
  await registerModerationRoutes(app, deps);
}
