import type { FastifyInstance } from "fastify";
import { purgeRevisionsQuery } from "../schemas/record.schema.js";
import { actorOf, requireRole } from "../middleware/auth.js";
import type { AppServices } from "../services/index.js";

interface RouteOptions {
  services: AppServices;
  adminRoles: string[];
  retentionDays: number;
}

export default async function revisionRoutes(app: FastifyInstance, opts: RouteOptions) {
  const { revisions } = opts.services;

  // ─── DELETE /revisions ──────────────────────────────────────────────

  app.delete("/revisions", { preHandler: requireRole(...opts.adminRoles) }, async (request) => {
    const olderThanDays = purgeRevisionsQuery.parse(request.query).olderThanDays ?? opts.retentionDays;
    const removed = await revisions.purgeOlderThan(olderThanDays, actorOf(request));
    return { removed, olderThanDays };
  });
}
