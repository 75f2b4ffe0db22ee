import 'reflect-metadata'
import { DataSource } from 'typeorm'
import { config } from '../config.js'
import { Committee } from './entities/Committee.js'
import { ReleasePolicy } from './entities/ReleasePolicy.js'
import { Project } from './entities/Project.js'
import { Release } from './entities/Release.js'
import { Revision } from './entities/Revision.js'
import { Task } from './entities/Task.js'
import { Distribution } from './entities/Distribution.js'
import { Initial1760000000000 } from './migrations/1760000000000-Initial.js'
import { Distributions1760000001000 } from './migrations/1760000001000-Distributions.js'

export const entities = [Committee, ReleasePolicy, Project, Release, Revision, Task, Distribution]
export const migrations = [Initial1760000000000, Distributions1760000001000]

export interface DataSourceOptions {
  // How long a write waits on a lock held by another connection before SQLITE_BUSY
  busyTimeoutMs?: number
}

export function createDataSource(database: string = config.databasePath, options: DataSourceOptions = {}): DataSource {
  return new DataSource({
    type: 'better-sqlite3',
    database,
    timeout: options.busyTimeoutMs ?? config.databaseBusyTimeoutMs,
    entities,
    migrations,
    synchronize: false,
    logging: config.databaseLogging,
  })
}

export const AppDataSource = createDataSource()
