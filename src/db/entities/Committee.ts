import { Entity, PrimaryColumn, Column, Index, ManyToOne, JoinColumn } from 'typeorm'

@Entity({ name: 'committees' })
export class Committee {
  @PrimaryColumn('text') name!: string

  @Column({ type: 'text', name: 'full_name', nullable: true }) fullName!: string | null

  // Order is not significant; kept sorted and de-duplicated on write
  @Column({ type: 'simple-json', name: 'committee_members' }) committeeMembers!: string[]
  @Column({ type: 'simple-json' }) committers!: string[]

  @Index()
  @Column({ type: 'text', name: 'parent_committee_name', nullable: true }) parentCommitteeName!: string | null
  @ManyToOne(() => Committee, { nullable: true, onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'parent_committee_name' })
  parentCommittee?: Committee | null
}
