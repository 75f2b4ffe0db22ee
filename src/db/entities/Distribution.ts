import { Entity, PrimaryGeneratedColumn, Column, Index, ManyToOne, JoinColumn } from 'typeorm'
import { Release } from './Release.js'
import { utcTimestamp } from '../adapters/timestamps.js'
import type { DistributionPlatform } from '../../services/distributions.js'

@Entity({ name: 'distributions' })
@Index(['releaseName', 'platform', 'ownerNamespace', 'package', 'version'], { unique: true })
export class Distribution {
  @PrimaryGeneratedColumn('increment') id!: number

  @Column({ type: 'text', name: 'release_name' }) releaseName!: string
  @ManyToOne(() => Release, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'release_name' })
  release?: Release

  @Column({ type: 'text' }) platform!: DistributionPlatform
  @Column({ type: 'text', name: 'owner_namespace' }) ownerNamespace!: string
  @Column({ type: 'text' }) package!: string
  @Column({ type: 'text' }) version!: string
  @Column({ type: 'boolean' }) staging!: boolean

  @Column({ type: 'text', name: 'upload_date', transformer: utcTimestamp }) uploadDate!: Date
  @Column({ type: 'text', name: 'api_url' }) apiUrl!: string
  @Column({ type: 'text', name: 'web_url', nullable: true }) webUrl!: string | null
}
