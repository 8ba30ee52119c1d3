import { createApp } from './app.js'
import { env } from './env.js'
import { initDb } from './db/init.js'
import { log } from './logger.js'
import { sweepExpired } from './services/rateLimit.js'

const app = createApp()

await initDb()

setInterval(() => sweepExpired(), 60_000).unref()

app.listen(env.PORT, () => {
  log('info', 'server.listening', { port: env.PORT })
})
