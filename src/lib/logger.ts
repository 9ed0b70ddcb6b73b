// Fastify creates the Pino logger. Services built outside a request take this
// type so they can be handed `app.log` or a child of it.
export type { FastifyBaseLogger as Logger } from "fastify";
