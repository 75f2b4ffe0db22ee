import { Entity, PrimaryColumn, Column, Index, ManyToOne, JoinColumn } from 'typeorm'
import { Release } from './Release.js'
import { utcTimestamp } from '../adapters/timestamps.js'

@Entity({ name: 'revisions' })
@Index(['releaseName', 'number'], { unique: true })
export class Revision {
  @PrimaryColumn({ type: 'text', name: 'release_name' }) releaseName!: string
  @PrimaryColumn({ type: 'integer' }) seq!: number

  @ManyToOne(() => Release, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'release_name' })
  release?: Release

  @Column({ type: 'integer' }) number!: number

  // "<release_name>-<number>", fixed at insert
  @Index({ unique: true })
  @Column({ type: 'text' }) name!: string

  @Column({ type: 'text' }) author!: string
  @Column({ type: 'text', nullable: true }) description!: string | null
  @Column({ type: 'text', name: 'parent_name', nullable: true }) parentName!: string | null

  @Column({ type: 'text', transformer: utcTimestamp }) created!: Date
}
