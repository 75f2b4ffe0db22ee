import { EntityManager, In, IsNull, Not } from 'typeorm'
import { Task, TaskStatus, TaskType } from '../db/entities/Task.js'
import type { Release } from '../db/entities/Release.js'
import { Reader, Store, withReader } from '../db/store.js'
import { decodeResult, encodeResult, TaskResult, TaskResultInput } from '../db/adapters/results.js'
import { NotFound } from './errors.js'
import { assertTaskTransition } from './taskStatus.js'
import { latestRevisionNumber } from './revisions.js'
import { releaseName } from './releases.js'
import { moduleLogger } from '../logger.js'

const log = moduleLogger('tasks')

export interface TaskScope {
  requester?: string | null
  projectName?: string | null
  versionName?: string | null
  revisionNumber?: number | null
}

export type TaskOutcome =
  | { status: 'COMPLETED'; result?: TaskResultInput | null }
  | { status: 'FAILED'; error: string }

async function demandTask(manager: EntityManager, id: number): Promise<Task> {
  const task = await manager.findOneBy(Task, { id })
  if (!task) throw new NotFound('Task', id)
  return task
}

export async function enqueue(
  store: Store,
  taskType: TaskType,
  params: Record<string, unknown>,
  scope: TaskScope = {}
): Promise<Task> {
  const task = await store.transaction(async (m) => {
    const row = m.create(Task, {
      taskType,
      status: 'QUEUED',
      taskArgs: params,
      added: new Date(),
      started: null,
      pid: null,
      completed: null,
      result: null,
      error: null,
      requester: scope.requester ?? null,
      projectName: scope.projectName ?? null,
      versionName: scope.versionName ?? null,
      revisionNumber: scope.revisionNumber ?? null,
    })
    return m.save(row)
  })
  log.info({ taskId: task.id, taskType }, 'Task queued')
  return task
}

function activate(task: Task, pid: number): Task {
  assertTaskTransition(task.id, task.status, 'ACTIVE')
  task.status = 'ACTIVE'
  task.started = new Date()
  task.pid = pid
  return task
}

export async function markActive(store: Store, taskId: number, pid: number): Promise<Task> {
  const task = await store.transaction(async (m) => m.save(activate(await demandTask(m, taskId), pid)))
  log.info({ taskId, pid }, 'Task active')
  return task
}

/** Takes the oldest queued task for a worker, or null when the queue is empty. */
export async function claimNextQueued(store: Store, pid: number): Promise<Task | null> {
  const task = await store.transaction(async (m) => {
    const next = await m.findOne(Task, { where: { status: 'QUEUED' }, order: { added: 'ASC', id: 'ASC' } })
    return next ? m.save(activate(next, pid)) : null
  })
  if (task) log.info({ taskId: task.id, taskType: task.taskType, pid }, 'Task claimed')
  return task
}

export async function markDone(store: Store, taskId: number, outcome: TaskOutcome): Promise<Task> {
  const task = await store.transaction(async (m) => {
    const row = await demandTask(m, taskId)
    assertTaskTransition(row.id, row.status, outcome.status)
    // Encode before touching the row so a bad payload changes nothing
    const result = outcome.status === 'COMPLETED' && outcome.result ? encodeResult(row.taskType, outcome.result) : null
    row.status = outcome.status
    row.completed = new Date()
    row.result = result
    row.error = outcome.status === 'FAILED' ? outcome.error : null
    return m.save(row)
  })
  if (task.status === 'FAILED') log.warn({ taskId, error: task.error }, 'Task failed')
  else log.info({ taskId }, 'Task completed')
  return task
}

export function taskResult(task: Task): TaskResult | null {
  return decodeResult(task.taskType, task.result)
}

export function getTask(db: Reader, taskId: number): Promise<Task> {
  return withReader(db, (m) => demandTask(m, taskId))
}

/**
 * Counts queued and active tasks for a revision of a release; without a
 * revision number, the release's latest revision.
 */
export function tasksOngoing(db: Reader, projectName: string, versionName: string, revisionNumber?: number): Promise<number> {
  return withReader(db, async (m) => {
    const revision = revisionNumber ?? (await latestRevisionNumber(m, releaseName(projectName, versionName)))
    if (revision === null) return 0
    return m.count(Task, {
      where: { projectName, versionName, revisionNumber: revision, status: In<TaskStatus>(['QUEUED', 'ACTIVE']) },
    })
  })
}

/** The most recent finished VOTE_INITIATE task for a release that recorded a result. */
export function latestVoteTask(db: Reader, release: Pick<Release, 'projectName' | 'version'>): Promise<Task | null> {
  return withReader(db, (m) =>
    m.findOne(Task, {
      where: {
        projectName: release.projectName,
        versionName: release.version,
        taskType: 'VOTE_INITIATE',
        status: Not(In<TaskStatus>(['QUEUED', 'ACTIVE'])),
        result: Not(IsNull()),
      },
      order: { added: 'DESC', id: 'DESC' },
    })
  )
}
