import { parseEnv } from './config/env.js'
import { buildApp } from './app.js'
import { parseThreadRef, formatThreadRef } from './comments/thread-ref.js'
import { createReclassifyPendingJob } from './jobs/reclassify-pending.js'

// Usage: node dist/reclassify.js <page-url>...
async function main() {
  const urls = process.argv.slice(2)
  if (urls.length === 0) {
    throw new Error('expecting at least one page URL')
  }

  const env = parseEnv(process.env)
  const app = await buildApp(env)
  await app.ready()

  const job = createReclassifyPendingJob(app.moderation, app.log)
  let failures = 0

  try {
    for (const url of urls) {
      const thread = parseThreadRef(url)
      const result = await job.run(thread)
      failures += result.failed.length
      app.log.info(
        { thread: formatThreadRef(thread), approved: result.approved, failed: result.failed },
        'Thread reclassified',
      )
    }
  } finally {
    await app.close()
  }

  process.exitCode = failures > 0 ? 1 : 0
}

main().catch((err: unknown) => {
  console.error(err)
  process.exit(1)
})
