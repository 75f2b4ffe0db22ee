import { Entity, PrimaryGeneratedColumn, Column } from 'typeorm'

// A null column means "unset": readers resolve it through the policy defaults
@Entity({ name: 'release_policies' })
export class ReleasePolicy {
  @PrimaryGeneratedColumn('increment') id!: number

  @Column({ type: 'simple-json', name: 'mailto_addresses', nullable: true }) mailtoAddresses!: string[] | null
  @Column({ type: 'boolean', name: 'manual_vote', nullable: true }) manualVote!: boolean | null
  @Column({ type: 'integer', name: 'min_hours', nullable: true }) minHours!: number | null
  @Column({ type: 'text', name: 'release_checklist', nullable: true }) releaseChecklist!: string | null
  @Column({ type: 'text', name: 'start_vote_template', nullable: true }) startVoteTemplate!: string | null
  @Column({ type: 'text', name: 'announce_release_template', nullable: true }) announceReleaseTemplate!: string | null
  @Column({ type: 'simple-json', name: 'binary_artifact_paths', nullable: true }) binaryArtifactPaths!: string[] | null
  @Column({ type: 'simple-json', name: 'source_artifact_paths', nullable: true }) sourceArtifactPaths!: string[] | null
  @Column({ type: 'text', name: 'github_repository_name', nullable: true }) githubRepositoryName!: string | null
  @Column({ type: 'simple-json', name: 'github_compose_workflow_path', nullable: true }) githubComposeWorkflowPath!: string[] | null
  @Column({ type: 'simple-json', name: 'github_vote_workflow_path', nullable: true }) githubVoteWorkflowPath!: string[] | null
  @Column({ type: 'simple-json', name: 'github_finish_workflow_path', nullable: true }) githubFinishWorkflowPath!: string[] | null
  @Column({ type: 'boolean', name: 'strict_checking', nullable: true }) strictChecking!: boolean | null
  @Column({ type: 'boolean', name: 'pause_for_rm', nullable: true }) pauseForRm!: boolean | null
}
