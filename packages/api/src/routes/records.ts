import type { FastifyInstance } from "fastify";
import {
  addAttachmentSchema,
  addCommentSchema,
  assignSchema,
  createRecordSchema,
  executeTransitionBody,
  listRecordsQuery,
  listRevisionsQuery,
  updateRecordBody,
} from "../schemas/record.schema.js";
import { uuidParam } from "../schemas/common.schema.js";
import { buildPaginatedResponse } from "../lib/pagination.js";
import { actorOf } from "../middleware/auth.js";
import type { AppServices } from "../services/index.js";

interface RouteOptions {
  services: AppServices;
}

export default async function recordRoutes(app: FastifyInstance, opts: RouteOptions) {
  const { records, transitions, revisions } = opts.services;

  // ─── POST /records ──────────────────────────────────────────────────

  app.post("/records", async (request, reply) => {
    const body = createRecordSchema.parse(request.body);
    const created = await records.createRecord(body, actorOf(request));
    return reply.status(201).send(created);
  });

  // ─── GET /records ───────────────────────────────────────────────────

  app.get("/records", async (request) => {
    const params = listRecordsQuery.parse(request.query);
    const page = await records.listRecords(params);
    return buildPaginatedResponse(page.data, page.total, params);
  });

  // ─── GET /records/:id ───────────────────────────────────────────────

  app.get("/records/:id", async (request) => {
    const { id } = uuidParam.parse(request.params);
    return records.getRecord(id);
  });

  // ─── PATCH /records/:id ─────────────────────────────────────────────

  app.patch("/records/:id", async (request) => {
    const { id } = uuidParam.parse(request.params);
    const { expectedVersion, changes } = updateRecordBody.parse(request.body);
    return records.updateRecord(id, changes, actorOf(request), expectedVersion);
  });

  // ─── Transitions ────────────────────────────────────────────────────

  app.post("/records/:id/transitions", async (request) => {
    const { id } = uuidParam.parse(request.params);
    const { transitionId, ...payload } = executeTransitionBody.parse(request.body);
    return transitions.executeTransition(id, transitionId, actorOf(request), payload);
  });

  app.get("/records/:id/transitions/available", async (request) => {
    const { id } = uuidParam.parse(request.params);
    return { data: await transitions.availableTransitions(id, actorOf(request)) };
  });

  app.get("/records/:id/history", async (request) => {
    const { id } = uuidParam.parse(request.params);
    return { data: await transitions.history(id) };
  });

  // ─── Sub-resource routes ────────────────────────────────────────────

  app.post("/records/:id/comments", async (request, reply) => {
    const { id } = uuidParam.parse(request.params);
    const body = addCommentSchema.parse(request.body);
    const comment = await records.addComment(id, body, actorOf(request));
    return reply.status(201).send(comment);
  });

  app.post("/records/:id/attachments", async (request, reply) => {
    const { id } = uuidParam.parse(request.params);
    const body = addAttachmentSchema.parse(request.body);
    const attachment = await records.addAttachment(id, body, actorOf(request));
    return reply.status(201).send(attachment);
  });

  app.post("/records/:id/assign", async (request) => {
    const { id } = uuidParam.parse(request.params);
    const body = assignSchema.parse(request.body);
    return records.assign(id, body, actorOf(request));
  });

  app.get("/records/:id/revisions", async (request) => {
    const { id } = uuidParam.parse(request.params);
    const params = listRevisionsQuery.parse(request.query);
    const page = await revisions.list(id, params);
    return buildPaginatedResponse(page.data, page.total, params);
  });
}
