import { STATUS_CODES } from "node:http";
import Fastify from "fastify";
import helmet from "@fastify/helmet";
import cors from "@fastify/cors";
import formbody from "@fastify/formbody";
import swagger from "@fastify/swagger";
import scalarApiReference from "@scalar/fastify-api-reference";
import * as Sentry from "@sentry/node";
import type { FastifyError } from "fastify";
import type { Env } from "./config/env.js";
import { createStore } from "./store/index.js";
import type { Store } from "./store/index.js";
import { createSpamClassifier } from "./services/spam-classifier.js";
import type { SpamClassifier } from "./services/spam-classifier.js";
import { createCommentCore } from "./comments/index.js";
import type { CommentService } from "./comments/service.js";
import type { ModerationService } from "./comments/moderation.js";
import healthRoutes from "./routes/health.js";
import { commentRoutes } from "./routes/comments.js";

// Extend Fastify types with decorated properties
declare module "fastify" {
  interface FastifyInstance {
    env: Env;
    store: Store;
    spamClassifier: SpamClassifier;
    comments: CommentService;
    moderation: ModerationService;
  }
}

function isVerbose(env: Env): boolean {
  return env.LOG_LEVEL === "debug" || env.LOG_LEVEL === "trace";
}

export async function buildApp(env: Env) {
  // Initialize GlitchTip/Sentry if DSN provided
  if (env.GLITCHTIP_DSN) {
    Sentry.init({
      dsn: env.GLITCHTIP_DSN,
      environment: isVerbose(env) ? "development" : "production",
    });
  }

  const app = Fastify({
    logger: {
      level: env.LOG_LEVEL,
      ...(isVerbose(env) ? { transport: { target: "pino-pretty" } } : {}),
    },
    trustProxy: true,
  });

  app.decorate("env", env);

  // Store
  const store = createStore(env.VALKEY_URL, app.log);
  app.decorate("store", store);

  // Spam classifier
  const spamClassifier = createSpamClassifier(
    {
      apiKey: env.AKISMET_KEY,
      siteUrl: env.SITE_URL,
      timeoutMs: env.CLASSIFIER_TIMEOUT_MS,
    },
    app.log,
  );
  app.decorate("spamClassifier", spamClassifier);
  if (!spamClassifier.isEnabled()) {
    app.log.warn("AKISMET_KEY not set, new comments will stay pending");
  }

  // Comment core
  const core = createCommentCore(store, spamClassifier, env, app.log);
  app.decorate("comments", core.comments);
  app.decorate("moderation", core.moderation);

  // Security headers (comment lists are fetched from other origins)
  await app.register(helmet, {
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        scriptSrc: ["'self'", "'unsafe-inline'", "https://cdn.jsdelivr.net"],
        styleSrc: ["'self'", "'unsafe-inline'", "https://cdn.jsdelivr.net"],
        imgSrc: ["'self'", "data:", "https:"],
        connectSrc: ["'self'"],
        fontSrc: ["'self'", "https://cdn.jsdelivr.net"],
        objectSrc: ["'none'"],
        frameSrc: ["'none'"],
      },
    },
    crossOriginResourcePolicy: { policy: "cross-origin" },
  });

  // CORS
  await app.register(cors, {
    origin:
      env.CORS_ORIGINS.trim() === "*"
        ? true
        : env.CORS_ORIGINS.split(",").map((o) => o.trim()),
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type"],
  });

  // Comment forms post application/x-www-form-urlencoded
  await app.register(formbody);

  // OpenAPI documentation (register before routes so schemas are collected)
  await app.register(swagger, {
    openapi: {
      openapi: "3.1.0",
      info: {
        title: "Page Comments API",
        description: "Per-page comment threads with spam-verdict moderation.",
        version: "0.1.0",
      },
    },
  });

  await app.register(scalarApiReference, {
    routePrefix: "/docs",
    configuration: {
      theme: "kepler",
    },
  });

  // Routes
  await app.register(healthRoutes);
  await app.register(commentRoutes());

  // OpenAPI document endpoint (after routes so all schemas are registered)
  app.get("/api/openapi.json", { schema: { hide: true } }, async (_request, reply) => {
    return reply
      .header("Content-Type", "application/json")
      .send(app.swagger());
  });

  app.addHook("onClose", async () => {
    app.log.info("Shutting down...");
    await store.quit();
    app.log.info("Connections closed");
  });

  app.setErrorHandler((error: FastifyError, request, reply) => {
    const statusCode = error.statusCode ?? 500;

    if (statusCode >= 500) {
      if (env.GLITCHTIP_DSN) {
        Sentry.captureException(error);
      }
      app.log.error({ err: error, requestId: request.id }, "Request failed");
    } else {
      app.log.debug({ err: error, requestId: request.id }, "Request rejected");
    }

    return reply.status(statusCode).send({
      error: STATUS_CODES[statusCode] ?? "Error",
      message:
        statusCode < 500 || isVerbose(env)
          ? error.message
          : "An unexpected error occurred",
      statusCode,
    });
  });

  return app;
}
