/**
 * REST Adapter
 *
 * Maps entity records and their relations to HTTP endpoints on a Fastify
 * instance. One set of routes per registered entity:
 *
 *   GET    /api/:pluralName            list, filtered by declared attributes
 *   GET    /api/:pluralName/:id        one record with its kept-updated relations
 *   POST   /api/:pluralName            create a record and its relations
 *   PUT    /api/:pluralName/:id        update a record and reconcile its relations
 *   DELETE /api/:pluralName/:id        delete a record and its kept-updated relations
 *   POST   /api/:pluralName/:id/clone  deep clone a record and its relations
 *
 * Request bodies are scoped by form name, e.g.
 *   { "Project": { "name": "Apollo" }, "Task": [{ "title": "Design" }] }
 */

import type { FastifyInstance, FastifyReply } from "fastify";
import { z } from "zod";
import { getAllEntities } from "../../core/entity-manager/entity-registry.js";
import type { EntityRecord, EntityRecordType, RecordCatalog } from "../../core/records/index.js";
import { RelationError } from "../../core/relations/index.js";

const bodySchema = z.record(z.unknown());

/** Error response body */
interface ErrorBody {
  success: false;
  error: string;
  errorType: "bad_request" | "not_found" | "unprocessable";
  errors?: Record<string, string[]>;
  relationErrors?: Record<string, Record<string, string[]>[]>;
}

/**
 * Serializes a record with every kept-updated relation that has been
 * fetched or assigned.
 */
export function serializeRecord(record: EntityRecord): Record<string, unknown> {
  const data: Record<string, unknown> = record.getAttributes();
  for (const name of record.keptUpdatedRelationNames()) {
    data[name] = record.getRelated(name).map((child) => child.getAttributes());
  }
  return data;
}

function notFound(reply: FastifyReply, recordType: EntityRecordType) {
  const body: ErrorBody = {
    success: false,
    error: `${recordType.name} not found`,
    errorType: "not_found",
  };
  return reply.status(404).send(body);
}

function badRequest(reply: FastifyReply, error: string) {
  const body: ErrorBody = { success: false, error, errorType: "bad_request" };
  return reply.status(400).send(body);
}

function unprocessable(reply: FastifyReply, record: EntityRecord, error: string) {
  const body: ErrorBody = {
    success: false,
    error,
    errorType: "unprocessable",
    errors: record.errors,
    relationErrors: record.relationsErrors(),
  };
  return reply.status(422).send(body);
}

/**
 * Splits "?relations=tasks,notes" into names. Absent → every kept-updated
 * relation of the record.
 */
function requestedRelations(record: EntityRecord, raw: string | undefined): string[] {
  if (raw === undefined) return record.keptUpdatedRelationNames();
  return raw
    .split(",")
    .map((name) => name.trim())
    .filter((name) => name !== "");
}

/**
 * Registers the record routes of every registered entity.
 */
export async function registerRelationRoutes(
  app: FastifyInstance,
  catalog: RecordCatalog
) {
  for (const entity of getAllEntities()) {
    const recordType = catalog.type(entity.name);
    const basePath = `/api/${entity.pluralName.toLowerCase()}`;

    /** Only declared attributes can be filtered on */
    const allowedFilterFields = new Set(recordType.attributeNames);

    /** GET /api/projects: List */
    app.get<{ Querystring: Record<string, string> }>(basePath, async (request, reply) => {
      const filters = request.query;
      const rejected = Object.keys(filters).filter((key) => !allowedFilterFields.has(key));
      if (rejected.length > 0) {
        return badRequest(reply, `Unknown filter fields: ${rejected.join(", ")}`);
      }

      const records = await recordType.findAll(filters);
      return { success: true, data: records.map((record) => record.getAttributes()) };
    });

    /** GET /api/projects/:id: Get one, with its kept-updated relations */
    app.get<{ Params: { id: string } }>(`${basePath}/:id`, async (request, reply) => {
      const record = await recordType.find(request.params.id);
      if (!record) return notFound(reply, recordType);

      for (const name of record.keptUpdatedRelationNames()) {
        await record.fetchRelated(name);
      }
      return { success: true, data: serializeRecord(record) };
    });

    /** POST /api/projects: Create with relations */
    app.post(basePath, async (request, reply) => {
      const body = bodySchema.safeParse(request.body ?? {});
      if (!body.success) return badRequest(reply, "Request body must be a JSON object");

      const record = recordType.create();
      try {
        if (!record.load(body.data)) {
          return badRequest(reply, `Request body has no "${recordType.formName}" input`);
        }
        await record.loadRelations(body.data);
      } catch (error) {
        if (error instanceof RelationError) return badRequest(reply, error.message);
        throw error;
      }

      if (!(await record.saveWithRelations())) {
        return unprocessable(reply, record, `${recordType.name} could not be saved`);
      }
      return reply.status(201).send({ success: true, data: serializeRecord(record) });
    });

    /** PUT /api/projects/:id: Update and reconcile relations */
    app.put<{ Params: { id: string }; Querystring: { relations?: string } }>(
      `${basePath}/:id`,
      async (request, reply) => {
        const body = bodySchema.safeParse(request.body ?? {});
        if (!body.success) return badRequest(reply, "Request body must be a JSON object");

        const record = await recordType.find(request.params.id);
        if (!record) return notFound(reply, recordType);

        try {
          record.load(body.data);
          await record.loadRelations(
            body.data,
            requestedRelations(record, request.query.relations)
          );
        } catch (error) {
          if (error instanceof RelationError) return badRequest(reply, error.message);
          throw error;
        }

        if (!(await record.saveWithRelations())) {
          return unprocessable(reply, record, `${recordType.name} could not be saved`);
        }
        return { success: true, data: serializeRecord(record) };
      }
    );

    /** DELETE /api/projects/:id: Delete with kept-updated relations */
    app.delete<{ Params: { id: string } }>(`${basePath}/:id`, async (request, reply) => {
      const record = await recordType.find(request.params.id);
      if (!record) return notFound(reply, recordType);

      if (!(await record.delete())) {
        return unprocessable(reply, record, `${recordType.name} could not be deleted`);
      }
      return { success: true, data: { id: record.getPrimaryKey() } };
    });

    /** POST /api/projects/:id/clone: Deep clone */
    app.post<{ Params: { id: string } }>(`${basePath}/:id/clone`, async (request, reply) => {
      const record = await recordType.find(request.params.id);
      if (!record) return notFound(reply, recordType);

      const clone = await record.deepClone();
      if (!(await clone.saveWithRelations())) {
        return unprocessable(reply, clone, `${recordType.name} could not be cloned`);
      }
      return reply.status(201).send({ success: true, data: serializeRecord(clone) });
    });
  }
}
