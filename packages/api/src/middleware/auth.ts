import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import fp from "fastify-plugin";
import fjwt from "@fastify/jwt";
import type { ActorContext } from "@caseflow/shared";

// ─── Type augmentations ─────────────────────────────────────────────

export interface AuthUser {
  userId: string;
  roles: string[];
}

declare module "@fastify/jwt" {
  interface FastifyJWT {
    payload: AuthUser;
    user: AuthUser;
  }
}

// ─── Auth plugin ────────────────────────────────────────────────────

export interface AuthPluginOptions {
  secret: string;
}

/** Verifies bearer tokens; issuance happens elsewhere. */
async function auth(app: FastifyInstance, opts: AuthPluginOptions) {
  await app.register(fjwt, { secret: opts.secret });

  app.addHook("onRequest", async (request: FastifyRequest, reply: FastifyReply) => {
    // Skip auth for health check
    if (request.url === "/health") return;

    try {
      await request.jwtVerify();
    } catch {
      return reply.status(401).send({ error: "Unauthorized" });
    }
  });
}

export const authPlugin = fp(auth, { name: "auth" });

// ─── Role-based preHandler factory ──────────────────────────────────

/** Passes when the caller holds at least one of the roles. */
export function requireRole(...roles: string[]) {
  return async (request: FastifyRequest, reply: FastifyReply) => {
    if (!request.user.roles.some((role) => roles.includes(role))) {
      return reply.status(403).send({ error: "Forbidden: insufficient role" });
    }
  };
}

export function actorOf(request: FastifyRequest): ActorContext {
  return { actorId: request.user.userId, roles: request.user.roles };
}

// ─── Test helper: create a signed JWT ───────────────────────────────

export function createTestToken(app: FastifyInstance, overrides: Partial<AuthUser> = {}): string {
  return app.jwt.sign({
    userId: overrides.userId ?? "test-user-id",
    roles: overrides.roles ?? ["admin"],
  });
}
