import { Redis } from 'ioredis'
import type { FastifyBaseLogger } from 'fastify'

/**
 * Connect to the Valkey (or Redis) instance that holds every thread, index
 * and comment record. The connection is lazy; the first command opens it.
 */
export function createStore(valkeyUrl: string, logger: FastifyBaseLogger) {
  const store = new Redis(valkeyUrl, {
    maxRetriesPerRequest: 3,
    retryStrategy(times: number) {
      return Math.min(times * 200, 2000)
    },
    lazyConnect: true,
  })

  store.on('error', (err: Error) => {
    logger.error({ err }, 'Valkey connection error')
  })

  store.on('connect', () => {
    logger.info('Connected to Valkey')
  })

  return store
}

export type Store = ReturnType<typeof createStore>
