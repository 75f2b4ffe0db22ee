import { Entity, PrimaryColumn, Column, Index, ManyToOne, OneToOne, JoinColumn } from 'typeorm'
import { Committee } from './Committee.js'
import { ReleasePolicy } from './ReleasePolicy.js'

@Entity({ name: 'projects' })
export class Project {
  @PrimaryColumn('text') name!: string

  @Column({ type: 'text', name: 'full_name', nullable: true }) fullName!: string | null
  @Column({ type: 'text', nullable: true }) description!: string | null
  @Column({ type: 'text', nullable: true }) category!: string | null
  @Column({ type: 'simple-json', name: 'programming_languages' }) programmingLanguages!: string[]

  @Index()
  @Column({ type: 'text', name: 'committee_name' }) committeeName!: string
  @ManyToOne(() => Committee, { onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'committee_name' })
  committee?: Committee

  @Column({ type: 'integer', name: 'release_policy_id', nullable: true, unique: true }) releasePolicyId!: number | null
  @OneToOne(() => ReleasePolicy, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'release_policy_id' })
  releasePolicy?: ReleasePolicy | null
}
