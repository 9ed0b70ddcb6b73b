import type { FastifyPluginCallback } from "fastify";
import { badRequest } from "../lib/api-errors.js";
import { escapeNonAscii } from "../lib/sanitize.js";
import {
  commentFormSchema,
  describeIssue,
  listCommentsQuerySchema,
} from "../validation/comments.js";

// ---------------------------------------------------------------------------
// OpenAPI JSON Schema definitions
// ---------------------------------------------------------------------------

const commentJsonSchema = {
  type: "object" as const,
  properties: {
    id: { type: "string" as const },
    author: { type: "string" as const },
    content: { type: "string" as const },
  },
};

const errorJsonSchema = {
  type: "object" as const,
  properties: {
    error: { type: "string" as const },
    message: { type: "string" as const },
    statusCode: { type: "integer" as const },
  },
};

// ---------------------------------------------------------------------------
// Comment routes plugin
// ---------------------------------------------------------------------------

/**
 * Comment routes for embedding pages.
 *
 * - GET  /comments/?url=...  -- Approved comments of the thread, oldest first
 * - POST /comments/          -- Submit a comment (form post), redirects back
 */
export function commentRoutes(): FastifyPluginCallback {
  return (app, _opts, done) => {
    const { comments } = app;

    // -------------------------------------------------------------------
    // GET /comments/ (public)
    // -------------------------------------------------------------------

    app.get("/comments/", {
      schema: {
        tags: ["Comments"],
        summary: "List approved comments for a page",
        querystring: {
          type: "object",
          properties: {
            url: { type: "string" },
            limit: { type: "integer", minimum: 1, maximum: 100 },
          },
        },
        response: {
          200: { type: "array", items: commentJsonSchema },
          400: errorJsonSchema,
          500: errorJsonSchema,
          503: errorJsonSchema,
        },
      },
    }, async (request, reply) => {
      const parsed = listCommentsQuerySchema.safeParse(request.query);
      if (!parsed.success) {
        throw badRequest(describeIssue(parsed.error));
      }

      const list = await comments.list(parsed.data.url, parsed.data.limit);
      return reply.send(list);
    });

    // -------------------------------------------------------------------
    // POST /comments/ (public)
    // -------------------------------------------------------------------

    app.post("/comments/", {
      schema: {
        tags: ["Comments"],
        summary: "Submit a comment for a page",
        consumes: ["application/x-www-form-urlencoded", "application/json"],
        response: {
          400: errorJsonSchema,
          403: errorJsonSchema,
          503: errorJsonSchema,
        },
      },
    }, async (request, reply) => {
      const parsed = commentFormSchema.safeParse(request.body);
      if (!parsed.success) {
        throw badRequest(describeIssue(parsed.error));
      }

      const result = await comments.submit({
        ...parsed.data,
        user_ip: request.ip,
        user_agent: request.headers["user-agent"] ?? "",
        referrer: request.headers.referer ?? "",
      });

      // Header values must be ASCII
      return reply.redirect(escapeNonAscii(result.permalink), 302);
    });

    done();
  };
}
