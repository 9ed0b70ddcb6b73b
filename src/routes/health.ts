import type { FastifyPluginCallback } from "fastify";

const healthRoutes: FastifyPluginCallback = (fastify, _opts, done) => {
  fastify.get("/api/health", async (_request, reply) => {
    return reply.send({
      status: "healthy",
      version: "0.1.0",
      uptime: process.uptime(),
    });
  });

  fastify.get("/api/health/ready", async (_request, reply) => {
    const checks: Record<string, { status: string; latency?: number }> = {};

    // Check store
    let ready = false;
    const storeStart = performance.now();
    try {
      await fastify.store.ping();
      ready = true;
      checks["store"] = {
        status: "healthy",
        latency: Math.round(performance.now() - storeStart),
      };
    } catch (err: unknown) {
      fastify.log.warn({ err }, "Store readiness check failed");
      checks["store"] = { status: "unhealthy" };
    }

    // The classifier is optional; without it comments stay pending
    checks["classifier"] = {
      status: fastify.spamClassifier.isEnabled() ? "healthy" : "disabled",
    };

    return reply.status(ready ? 200 : 503).send({
      status: ready ? "ready" : "degraded",
      checks,
    });
  });

  done();
};

export default healthRoutes;
