import { TaskStatus } from '../db/entities/Task.js'
import { InvalidTransition } from './errors.js'
import { moduleLogger } from '../logger.js'

const log = moduleLogger('task-status')

const TASK_TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  QUEUED: ['ACTIVE'],
  ACTIVE: ['COMPLETED', 'FAILED'],
  COMPLETED: [],
  FAILED: [],
}

export function isTerminalTaskStatus(status: TaskStatus): boolean {
  return TASK_TRANSITIONS[status].length === 0
}

export function canTransitionTask(from: TaskStatus, to: TaskStatus): boolean {
  return TASK_TRANSITIONS[from].includes(to)
}

export function assertTaskTransition(taskId: number, from: TaskStatus, to: TaskStatus): void {
  if (canTransitionTask(from, to)) return
  log.warn({ taskId, from, to, terminal: isTerminalTaskStatus(from) }, 'Rejected task status transition')
  throw new InvalidTransition(taskId, from, to)
}
