import 'reflect-metadata'
import fs from 'fs'
import path from 'path'
import { AppDataSource } from '../db/data-source.js'
import { config } from '../config.js'
import { logger } from '../logger.js'

async function run() {
  if (config.databasePath !== ':memory:') fs.mkdirSync(path.dirname(config.databasePath), { recursive: true })
  await AppDataSource.initialize()
  const applied = await AppDataSource.runMigrations()
  await AppDataSource.destroy()
  logger.info({ database: config.databasePath, applied: applied.map((m) => m.name) }, 'Migrations applied')
}

run().catch((e) => {
  logger.error({ err: e }, 'Migration run failed')
  process.exit(1)
})
