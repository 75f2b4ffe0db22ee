import { Entity, PrimaryGeneratedColumn, Column, Index, Check } from 'typeorm'
import { utcTimestamp } from '../adapters/timestamps.js'

export const TASK_STATUSES = ['QUEUED', 'ACTIVE', 'COMPLETED', 'FAILED'] as const
export type TaskStatus = (typeof TASK_STATUSES)[number]

export const TASK_TYPES = [
  'HASHING_CHECK',
  'LICENSE_FILES',
  'SIGNATURE_CHECK',
  'SBOM_GENERATE_CYCLONEDX',
  'SVN_IMPORT_FILES',
  'VOTE_INITIATE',
  'MESSAGE_SEND',
  'DISTRIBUTION_WORKFLOW',
] as const
export type TaskType = (typeof TASK_TYPES)[number]

export function isTaskType(value: string): value is TaskType {
  return (TASK_TYPES as readonly string[]).includes(value)
}

export const TASK_STATUS_CHECK = `(
  (status = 'QUEUED' AND started IS NULL AND pid IS NULL)
  OR (status = 'ACTIVE' AND started IS NOT NULL AND pid IS NOT NULL AND completed IS NULL)
  OR (status IN ('COMPLETED', 'FAILED') AND completed IS NOT NULL)
)`

@Entity({ name: 'tasks' })
@Check('tasks_status_consistency', TASK_STATUS_CHECK)
export class Task {
  @PrimaryGeneratedColumn('increment') id!: number

  @Column({ type: 'text', name: 'task_type' }) taskType!: TaskType

  @Index()
  @Column({ type: 'text' }) status!: TaskStatus

  @Column({ type: 'simple-json', name: 'task_args' }) taskArgs!: Record<string, unknown>

  @Column({ type: 'text', transformer: utcTimestamp }) added!: Date
  @Column({ type: 'text', nullable: true, transformer: utcTimestamp }) started!: Date | null
  @Column({ type: 'integer', nullable: true }) pid!: number | null
  @Column({ type: 'text', nullable: true, transformer: utcTimestamp }) completed!: Date | null

  // Encoded by the result codec; decode through taskResult()
  @Column({ type: 'text', nullable: true }) result!: string | null
  @Column({ type: 'text', nullable: true }) error!: string | null

  @Column({ type: 'text', nullable: true }) requester!: string | null

  @Index()
  @Column({ type: 'text', nullable: true, name: 'project_name' }) projectName!: string | null
  @Column({ type: 'text', nullable: true, name: 'version_name' }) versionName!: string | null
  @Column({ type: 'integer', nullable: true, name: 'revision_number' }) revisionNumber!: number | null
}
