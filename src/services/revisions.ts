import { EntityManager } from 'typeorm'
import { Revision } from '../db/entities/Revision.js'
import { Reader, Store, withReader } from '../db/store.js'
import { normalizeTimestamp } from '../db/adapters/timestamps.js'
import { AllocationConflict, ConstraintViolation, DatabaseBusy, NotFound, ReleaseImmutable } from './errors.js'
import { demandRelease, releaseName } from './releases.js'
import { isPublished } from './phases.js'
import { moduleLogger } from '../logger.js'

const log = moduleLogger('revisions')

// The first attempt plus one retry of the whole transaction
export const MAX_ALLOCATION_ATTEMPTS = 2

export interface RevisionSlot {
  seq: number
  number: number
  name: string
}

export type RevisionAllocator = (manager: EntityManager, releaseName: string) => Promise<RevisionSlot>

export interface RevisionInput {
  releaseName: string
  author: string
  description?: string | null
  created?: Date | string
}

export function revisionName(releaseName: string, number: number): string {
  return `${releaseName}-${number}`
}

/**
 * Picks the next sequence number for a release from the current maximum.
 * Only meaningful inside the transaction that inserts the revision.
 */
export async function allocateRevision(manager: EntityManager, releaseName: string): Promise<RevisionSlot> {
  const row = await manager
    .createQueryBuilder(Revision, 'r')
    .select('MAX(r.seq)', 'max')
    .where('r.releaseName = :releaseName', { releaseName })
    .getRawOne<{ max: number | null }>()
  const next = (row?.max ?? 0) + 1
  return { seq: next, number: next, name: revisionName(releaseName, next) }
}

export function latestRevisionNumber(db: Reader, releaseName: string): Promise<number | null> {
  return withReader(db, async (m) => {
    const row = await m
      .createQueryBuilder(Revision, 'r')
      .select('MAX(r.number)', 'latest')
      .where('r.releaseName = :releaseName', { releaseName })
      .getRawOne<{ latest: number | null }>()
    return row?.latest ?? null
  })
}

export function latestRevision(db: Reader, releaseName: string): Promise<Revision | null> {
  return withReader(db, (m) => m.findOne(Revision, { where: { releaseName }, order: { seq: 'DESC' } }))
}

export interface RevisionInfo {
  number: number
  author: string
  created: Date
}

/** Number, author and creation time of a release's latest revision; null before the first one. */
export function latestInfo(db: Reader, projectName: string, version: string): Promise<RevisionInfo | null> {
  return withReader(db, async (m) => {
    const release = await demandRelease(m, releaseName(projectName, version))
    const revision = await latestRevision(m, release.name)
    return revision && { number: revision.number, author: revision.author, created: revision.created }
  })
}

// Another writer took the number, or held the database while we tried to write
function isRetryable(err: unknown): boolean {
  return (err instanceof ConstraintViolation && err.kind === 'unique' && err.table === 'revisions') || err instanceof DatabaseBusy
}

export async function createRevision(
  store: Store,
  input: RevisionInput,
  allocate: RevisionAllocator = allocateRevision
): Promise<Revision> {
  const created = normalizeTimestamp(input.created ?? new Date())
  for (let attempt = 1; ; attempt++) {
    try {
      const revision = await store.transaction(async (m) => {
        const release = await demandRelease(m, input.releaseName)
        if (isPublished(release.phase)) throw new ReleaseImmutable(release.name)
        const parent = await latestRevision(m, release.name)
        const slot = await allocate(m, release.name)
        const row = m.create(Revision, {
          releaseName: release.name,
          seq: slot.seq,
          number: slot.number,
          name: slot.name,
          author: input.author,
          description: input.description ?? null,
          parentName: parent?.name ?? null,
          created,
        })
        await m.insert(Revision, row)
        return row
      })
      log.info({ release: input.releaseName, revision: revision.name, attempt }, 'Revision created')
      return revision
    } catch (err) {
      if (!isRetryable(err)) throw err
      if (attempt >= MAX_ALLOCATION_ATTEMPTS) {
        log.error({ release: input.releaseName, attempt }, 'Revision allocation kept colliding')
        throw new AllocationConflict(input.releaseName, attempt)
      }
      log.warn({ release: input.releaseName, attempt, reason: err instanceof DatabaseBusy ? 'busy' : 'collision' }, 'Revision allocation failed, retrying')
    }
  }
}

export async function getRevision(db: Reader, releaseName: string, number: number): Promise<Revision> {
  const revision = await withReader(db, (m) => m.findOneBy(Revision, { releaseName, number }))
  if (!revision) throw new NotFound('Revision', revisionName(releaseName, number))
  return revision
}

export function listRevisions(db: Reader, releaseName: string): Promise<Revision[]> {
  return withReader(db, (m) => m.find(Revision, { where: { releaseName }, order: { seq: 'ASC' } }))
}
