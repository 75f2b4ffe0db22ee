import { EntityManager, In } from 'typeorm'
import { Release, ReleasePhase } from '../db/entities/Release.js'
import { Reader, Store, withReader } from '../db/store.js'
import { normalizeTimestamp } from '../db/adapters/timestamps.js'
import { ConstraintViolation, NotFound } from './errors.js'
import { assertPhaseTransition, phaseIndex } from './phases.js'
import { userProjects } from './projects.js'
import { moduleLogger } from '../logger.js'

const log = moduleLogger('releases')

const VERSION_PATTERN = /^[A-Za-z0-9][A-Za-z0-9.+_-]*$/

export interface ReleaseInput {
  projectName: string
  version: string
  name?: string
  created?: Date | string
}

export function releaseName(projectName: string, version: string): string {
  return `${projectName}-${version}`
}

/** Derives and checks the fields a new release row gets before it is inserted. */
export function prepareRelease(input: ReleaseInput): Pick<Release, 'name' | 'projectName' | 'version' | 'phase' | 'created' | 'released' | 'podlingThreadId'> {
  if (!VERSION_PATTERN.test(input.version)) {
    throw new ConstraintViolation(`Invalid version ${JSON.stringify(input.version)}`, 'releases')
  }
  return {
    name: input.name ?? releaseName(input.projectName, input.version),
    projectName: input.projectName,
    version: input.version,
    phase: 'RELEASE_CANDIDATE_DRAFT',
    created: normalizeTimestamp(input.created ?? new Date()),
    released: null,
    podlingThreadId: null,
  }
}

export async function demandRelease(manager: EntityManager, name: string): Promise<Release> {
  const release = await manager.findOneBy(Release, { name })
  if (!release) throw new NotFound('Release', name)
  return release
}

export async function createRelease(store: Store, input: ReleaseInput): Promise<Release> {
  const fields = prepareRelease(input)
  const release = await store.transaction(async (m) => {
    const row = m.create(Release, fields)
    await m.insert(Release, row)
    return row
  })
  log.info({ release: release.name, project: release.projectName, version: release.version }, 'Release created')
  return release
}

export function findRelease(db: Reader, name: string): Promise<Release | null> {
  return withReader(db, (m) => m.findOneBy(Release, { name }))
}

export function getRelease(db: Reader, name: string): Promise<Release> {
  return withReader(db, (m) => demandRelease(m, name))
}

/**
 * Moves a release one phase forward. Entering RELEASE stamps `released`.
 */
export async function advanceReleasePhase(store: Store, name: string, target: ReleasePhase): Promise<Release> {
  return store.transaction(async (m) => {
    const release = await demandRelease(m, name)
    const from = release.phase
    assertPhaseTransition(name, from, target)
    release.phase = target
    if (target === 'RELEASE') release.released = new Date()
    await m.update(Release, { name }, { phase: release.phase, released: release.released })
    log.info({ release: name, from, to: target }, 'Release phase changed')
    return release
  })
}

export async function setPodlingThread(store: Store, name: string, threadId: string | null): Promise<Release> {
  return store.transaction(async (m) => {
    const release = await demandRelease(m, name)
    release.podlingThreadId = threadId
    await m.update(Release, { name }, { podlingThreadId: threadId })
    return release
  })
}

export function releasesByPhase(db: Reader, projectName: string, phase: ReleasePhase): Promise<Release[]> {
  return withReader(db, (m) => m.find(Release, { where: { projectName, phase }, order: { created: 'DESC' } }))
}

const IN_PROGRESS: ReleasePhase[] = ['RELEASE_CANDIDATE_DRAFT', 'RELEASE_CANDIDATE', 'RELEASE_PREVIEW']

/** Drafts, then candidates, then previews; newest first within each phase. */
export async function releasesInProgress(db: Reader, projectName: string): Promise<Release[]> {
  const releases = await withReader(db, (m) =>
    m.find(Release, { where: { projectName, phase: In<ReleasePhase>(IN_PROGRESS) }, order: { created: 'DESC' } })
  )
  return releases.sort((a, b) => phaseIndex(a.phase) - phaseIndex(b.phase))
}

export interface UnfinishedReleases {
  projectName: string
  displayName: string
  releases: Release[]
}

/**
 * In-progress releases of every project a user takes part in, one entry per
 * project with any, ordered by project display name.
 */
export function unfinishedReleases(db: Reader, uid: string): Promise<UnfinishedReleases[]> {
  return withReader(db, async (m) => {
    const projects = await userProjects(m, uid)
    const out: UnfinishedReleases[] = []
    for (const project of projects.sort((a, b) => a.displayName.localeCompare(b.displayName))) {
      const releases = await m.find(Release, {
        where: { projectName: project.name, phase: In<ReleasePhase>(IN_PROGRESS) },
        order: { created: 'DESC' },
      })
      if (releases.length > 0) out.push({ projectName: project.name, displayName: project.displayName, releases })
    }
    return out
  })
}

export async function allReleases(db: Reader, projectName: string): Promise<Release[]> {
  const releases = await withReader(db, (m) => m.find(Release, { where: { projectName } }))
  const parsed = releases.map((r) => parseVersion(r.version))
  // One unparsable version puts the whole list on the fallback ordering
  if (parsed.every((v): v is ParsedVersion => v !== null)) {
    const keyed = releases.map((release, i) => ({ release, version: parsed[i] }))
    return keyed.sort((a, b) => compareParsed(b.version, a.version)).map((k) => k.release)
  }
  return releases.sort((a, b) => compareVersionParts(b.version, a.version))
}

interface ParsedVersion {
  release: number[]
  pre: [number, number] | null
  post: number | null
  dev: number | null
  local: string
}

const VERSION_SYNTAX =
  /^v?(\d+(?:\.\d+)*)(?:[-_.]?(a|alpha|b|beta|c|rc|pre|preview)[-_.]?(\d+)?)?(?:-(\d+)|[-_.]?(post|rev|r)[-_.]?(\d+)?)?(?:[-_.]?(dev)[-_.]?(\d+)?)?(?:\+([a-z0-9]+(?:[-_.][a-z0-9]+)*))?$/i

const PRE_RANK: Record<string, number> = { a: 0, alpha: 0, b: 1, beta: 1, c: 2, rc: 2, pre: 2, preview: 2 }

/** Reads a release version with pre, post, dev and local segments, or null when it does not follow that syntax. */
export function parseVersion(version: string): ParsedVersion | null {
  const m = VERSION_SYNTAX.exec(version.trim())
  if (!m) return null
  const [, release, preTag, preNum, implicitPost, postTag, postNum, devTag, devNum, local] = m
  return {
    release: release.split('.').map(Number),
    pre: preTag ? [PRE_RANK[preTag.toLowerCase()], Number(preNum ?? 0)] : null,
    post: implicitPost ? Number(implicitPost) : postTag ? Number(postNum ?? 0) : null,
    dev: devTag ? Number(devNum ?? 0) : null,
    local: local ?? '',
  }
}

function compareNumbers(a: number[], b: number[]): number {
  for (let i = 0; i < Math.max(a.length, b.length); i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0)
    if (diff !== 0) return diff
  }
  return 0
}

function compareNumber(a: number, b: number): number {
  return a === b ? 0 : a < b ? -1 : 1
}

function compareText(a: string, b: string): number {
  return a === b ? 0 : a < b ? -1 : 1
}

// A final release outranks its pre-releases; a bare dev release ranks below both
function preKey(v: ParsedVersion): number[] {
  if (v.pre) return [1, ...v.pre]
  return v.dev !== null && v.post === null ? [0] : [2]
}

function compareParsed(a: ParsedVersion, b: ParsedVersion): number {
  return (
    compareNumbers(a.release, b.release) ||
    compareNumbers(preKey(a), preKey(b)) ||
    (a.post ?? -1) - (b.post ?? -1) ||
    compareNumber(a.dev ?? Infinity, b.dev ?? Infinity) ||
    compareText(a.local, b.local)
  )
}

type VersionPart = [0, number] | [1, string]

// Numeric parts compare numerically and sort before textual ones
function versionKey(version: string): VersionPart[] {
  return version
    .replace(/[+-]/g, '.')
    .split('.')
    .map((part): VersionPart => (/^\d+$/.test(part) ? [0, Number(part)] : [1, part]))
}

function compareVersionParts(a: string, b: string): number {
  const ka = versionKey(a)
  const kb = versionKey(b)
  for (let i = 0; i < Math.min(ka.length, kb.length); i++) {
    const pa = ka[i]
    const pb = kb[i]
    if (pa[0] === 0 && pb[0] === 0) {
      if (pa[1] !== pb[1]) return pa[1] - pb[1]
    } else if (pa[0] === 1 && pb[0] === 1) {
      if (pa[1] !== pb[1]) return compareText(pa[1], pb[1])
    } else {
      return pa[0] - pb[0]
    }
  }
  return ka.length - kb.length
}

export function compareVersions(a: string, b: string): number {
  const pa = parseVersion(a)
  const pb = parseVersion(b)
  return pa && pb ? compareParsed(pa, pb) : compareVersionParts(a, b)
}
