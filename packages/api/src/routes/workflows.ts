import type { FastifyInstance } from "fastify";
import {
  assignClassificationsSchema,
  createStateSchema,
  createTransitionSchema,
  createWorkflowSchema,
  deleteWorkflowQuery,
  listWorkflowsQuery,
  matchWorkflowSchema,
  updateStateSchema,
  updateTransitionSchema,
  updateWorkflowSchema,
} from "../schemas/workflow.schema.js";
import { uuidParam } from "../schemas/common.schema.js";
import { actorOf, requireRole } from "../middleware/auth.js";
import type { AppServices } from "../services/index.js";

interface RouteOptions {
  services: AppServices;
  adminRoles: string[];
}

export default async function workflowRoutes(app: FastifyInstance, opts: RouteOptions) {
  const { workflows } = opts.services;
  const admin = { preHandler: requireRole(...opts.adminRoles) };

  // ─── POST /workflows ────────────────────────────────────────────────

  app.post("/workflows", admin, async (request, reply) => {
    const body = createWorkflowSchema.parse(request.body);
    const created = await workflows.createWorkflow(body, actorOf(request));
    return reply.status(201).send(created);
  });

  // ─── GET /workflows ─────────────────────────────────────────────────

  app.get("/workflows", async (request) => {
    const query = listWorkflowsQuery.parse(request.query);
    return { data: await workflows.listWorkflows(query) };
  });

  app.get("/workflows/deleted", admin, async () => {
    return { data: await workflows.listDeletedWorkflows() };
  });

  // ─── Import / match ─────────────────────────────────────────────────

  app.post("/workflows/import", admin, async (request, reply) => {
    const result = await workflows.importWorkflow(request.body, actorOf(request));
    return reply.status(201).send(result);
  });

  app.post("/workflows/match", async (request) => {
    const criteria = matchWorkflowSchema.parse(request.body);
    return workflows.matchWorkflow(criteria);
  });

  // ─── GET /workflows/:id ─────────────────────────────────────────────

  app.get("/workflows/:id", async (request) => {
    const { id } = uuidParam.parse(request.params);
    return workflows.getWorkflow(id);
  });

  // ─── PATCH /workflows/:id ───────────────────────────────────────────

  app.patch("/workflows/:id", admin, async (request) => {
    const { id } = uuidParam.parse(request.params);
    const body = updateWorkflowSchema.parse(request.body);
    return workflows.updateWorkflow(id, body);
  });

  app.put("/workflows/:id/classifications", admin, async (request) => {
    const { id } = uuidParam.parse(request.params);
    const body = assignClassificationsSchema.parse(request.body);
    return workflows.assignClassifications(id, body);
  });

  // ─── Lifecycle ──────────────────────────────────────────────────────

  app.delete("/workflows/:id", admin, async (request, reply) => {
    const { id } = uuidParam.parse(request.params);
    const { permanent } = deleteWorkflowQuery.parse(request.query);
    if (permanent) {
      await workflows.permanentlyDeleteWorkflow(id, actorOf(request));
      return reply.status(204).send();
    }
    return workflows.softDeleteWorkflow(id, actorOf(request));
  });

  app.post("/workflows/:id/restore", admin, async (request) => {
    const { id } = uuidParam.parse(request.params);
    return workflows.restoreWorkflow(id, actorOf(request));
  });

  app.post("/workflows/:id/duplicate", admin, async (request, reply) => {
    const { id } = uuidParam.parse(request.params);
    const copy = await workflows.duplicateWorkflow(id, actorOf(request));
    return reply.status(201).send(copy);
  });

  app.get("/workflows/:id/export", admin, async (request) => {
    const { id } = uuidParam.parse(request.params);
    return workflows.exportWorkflow(id);
  });

  app.get("/workflows/:id/validation", admin, async (request) => {
    const { id } = uuidParam.parse(request.params);
    return { warnings: await workflows.validateWorkflow(id) };
  });

  // ─── States ─────────────────────────────────────────────────────────

  app.get("/workflows/:id/initial-state", async (request) => {
    const { id } = uuidParam.parse(request.params);
    return workflows.initialStateOf(id);
  });

  app.post("/workflows/:id/states", admin, async (request, reply) => {
    const { id } = uuidParam.parse(request.params);
    const body = createStateSchema.parse(request.body);
    const state = await workflows.createState(id, body);
    return reply.status(201).send(state);
  });

  app.patch("/states/:id", admin, async (request) => {
    const { id } = uuidParam.parse(request.params);
    const body = updateStateSchema.parse(request.body);
    return workflows.updateState(id, body);
  });

  app.delete("/states/:id", admin, async (request, reply) => {
    const { id } = uuidParam.parse(request.params);
    await workflows.deleteState(id);
    return reply.status(204).send();
  });

  app.get("/states/:id/transitions", async (request) => {
    const { id } = uuidParam.parse(request.params);
    return { data: await workflows.transitionsFrom(id) };
  });

  // ─── Transitions ────────────────────────────────────────────────────

  app.get("/workflows/:id/transitions", async (request) => {
    const { id } = uuidParam.parse(request.params);
    return { data: await workflows.transitionsOf(id) };
  });

  app.post("/workflows/:id/transitions", admin, async (request, reply) => {
    const { id } = uuidParam.parse(request.params);
    const body = createTransitionSchema.parse(request.body);
    const transition = await workflows.createTransition(id, body);
    return reply.status(201).send(transition);
  });

  app.patch("/transitions/:id", admin, async (request) => {
    const { id } = uuidParam.parse(request.params);
    const body = updateTransitionSchema.parse(request.body);
    return workflows.updateTransition(id, body);
  });

  app.delete("/transitions/:id", admin, async (request, reply) => {
    const { id } = uuidParam.parse(request.params);
    await workflows.deleteTransition(id);
    return reply.status(204).send();
  });
}
