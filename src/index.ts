import 'reflect-metadata'

export { AppDataSource, createDataSource, entities, migrations } from './db/data-source.js'
export { Store, withReader, translateError } from './db/store.js'
export type { Reader } from './db/store.js'

export { Committee } from './db/entities/Committee.js'
export { Project } from './db/entities/Project.js'
export { ReleasePolicy } from './db/entities/ReleasePolicy.js'
export { Release, RELEASE_PHASES } from './db/entities/Release.js'
export type { ReleasePhase } from './db/entities/Release.js'
export { Revision } from './db/entities/Revision.js'
export { Task, TASK_STATUSES, TASK_TYPES, isTaskType } from './db/entities/Task.js'
export type { TaskStatus, TaskType } from './db/entities/Task.js'
export { Distribution } from './db/entities/Distribution.js'

export { normalizeTimestamp, denormalizeTimestamp, encodeTimestamp } from './db/adapters/timestamps.js'
export { encodeResult, decodeResult, resultSchemas } from './db/adapters/results.js'
export type { TaskResult, TaskResultFor, TaskResultInput } from './db/adapters/results.js'

export * from './services/errors.js'
export * from './services/committees.js'
export * from './services/projects.js'
export * from './services/policy.js'
export * from './services/releases.js'
export * from './services/phases.js'
export * from './services/revisions.js'
export * from './services/taskStatus.js'
export * from './services/tasks.js'
export * from './services/distributions.js'
