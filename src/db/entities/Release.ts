import { Entity, PrimaryColumn, Column, Index, ManyToOne, JoinColumn } from 'typeorm'
import { Project } from './Project.js'
import { utcTimestamp } from '../adapters/timestamps.js'

export const RELEASE_PHASES = ['RELEASE_CANDIDATE_DRAFT', 'RELEASE_CANDIDATE', 'RELEASE_PREVIEW', 'RELEASE'] as const
export type ReleasePhase = (typeof RELEASE_PHASES)[number]

@Entity({ name: 'releases' })
@Index(['projectName', 'version'], { unique: true })
export class Release {
  @PrimaryColumn('text') name!: string

  @Column({ type: 'text' }) version!: string
  @Column({ type: 'text' }) phase!: ReleasePhase

  @Column({ type: 'text', name: 'project_name' }) projectName!: string
  @ManyToOne(() => Project, { onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'project_name' })
  project?: Project

  @Column({ type: 'text', transformer: utcTimestamp }) created!: Date
  @Column({ type: 'text', nullable: true, transformer: utcTimestamp }) released!: Date | null

  @Column({ type: 'text', name: 'podling_thread_id', nullable: true }) podlingThreadId!: string | null
}
