import { Store } from '../db/store.js'
import {
  advanceReleasePhase,
  allReleases,
  compareVersions,
  createRelease,
  getRelease,
  releaseName,
  releasesByPhase,
  releasesInProgress,
  setPodlingThread,
  unfinishedReleases,
} from '../services/releases.js'
import { createCommittee } from '../services/committees.js'
import { createProject, userProjects } from '../services/projects.js'
import { canAdvance, nextPhase } from '../services/phases.js'
import { ConstraintViolation, InvalidPhaseTransition, NotFound } from '../services/errors.js'
import { openTestStore, seedRelease } from './helpers.js'

describe('releases', () => {
  let store: Store

  beforeEach(async () => {
    store = await openTestStore()
    await seedRelease(store)
  })

  afterEach(async () => {
    await store.close()
  })

  it('derives the name from project and version and starts as a draft', async () => {
    const release = await getRelease(store, 'tooling-core-1.0.0')
    expect(release.name).toBe(releaseName('tooling-core', '1.0.0'))
    expect(release.phase).toBe('RELEASE_CANDIDATE_DRAFT')
    expect(release.released).toBeNull()
  })

  it('rejects a second release with the same project and version', async () => {
    await expect(createRelease(store, { projectName: 'tooling-core', version: '1.0.0', name: 'other-name' })).rejects.toBeInstanceOf(
      ConstraintViolation
    )
    await expect(createRelease(store, { projectName: 'tooling-core', version: '1.0.0' })).rejects.toMatchObject({ kind: 'unique' })

    const first = await getRelease(store, 'tooling-core-1.0.0')
    expect(first.phase).toBe('RELEASE_CANDIDATE_DRAFT')
    await expect(getRelease(store, 'other-name')).rejects.toBeInstanceOf(NotFound)
  })

  it('rejects releases of unknown projects and malformed versions', async () => {
    await expect(createRelease(store, { projectName: 'ghost', version: '1.0.0' })).rejects.toMatchObject({ kind: 'foreign_key' })
    await expect(createRelease(store, { projectName: 'tooling-core', version: '../1' })).rejects.toBeInstanceOf(ConstraintViolation)
  })

  it('stores the creation time as the UTC instant', async () => {
    await createRelease(store, { projectName: 'tooling-core', version: '2.0.0', created: '2025-06-01T09:15:00-04:00' })
    const release = await getRelease(store, 'tooling-core-2.0.0')
    expect(release.created.toISOString()).toBe('2025-06-01T13:15:00.000Z')
    expect(release.created.getTime()).toBe(Date.parse('2025-06-01T09:15:00-04:00'))
  })

  it('moves forward one phase at a time up to RELEASE', async () => {
    const name = 'tooling-core-1.0.0'
    expect((await advanceReleasePhase(store, name, 'RELEASE_CANDIDATE')).phase).toBe('RELEASE_CANDIDATE')
    expect((await advanceReleasePhase(store, name, 'RELEASE_PREVIEW')).phase).toBe('RELEASE_PREVIEW')
    const published = await advanceReleasePhase(store, name, 'RELEASE')
    expect(published.phase).toBe('RELEASE')

    const stored = await getRelease(store, name)
    expect(stored.phase).toBe('RELEASE')
    expect(stored.released).toBeInstanceOf(Date)
  })

  it('rejects skipping or reversing phases without changing the row', async () => {
    const name = 'tooling-core-1.0.0'
    await expect(advanceReleasePhase(store, name, 'RELEASE')).rejects.toBeInstanceOf(InvalidPhaseTransition)
    expect((await getRelease(store, name)).phase).toBe('RELEASE_CANDIDATE_DRAFT')

    await advanceReleasePhase(store, name, 'RELEASE_CANDIDATE')
    await expect(advanceReleasePhase(store, name, 'RELEASE_CANDIDATE_DRAFT')).rejects.toBeInstanceOf(InvalidPhaseTransition)
    await expect(advanceReleasePhase(store, name, 'RELEASE_CANDIDATE')).rejects.toBeInstanceOf(InvalidPhaseTransition)
    expect((await getRelease(store, name)).phase).toBe('RELEASE_CANDIDATE')
  })

  it('lists releases by phase and in progress', async () => {
    await createRelease(store, { projectName: 'tooling-core', version: '0.9.0', created: '2024-01-01T00:00:00Z' })
    await advanceReleasePhase(store, 'tooling-core-0.9.0', 'RELEASE_CANDIDATE')

    expect((await releasesByPhase(store, 'tooling-core', 'RELEASE_CANDIDATE')).map((r) => r.version)).toEqual(['0.9.0'])
    expect((await releasesInProgress(store, 'tooling-core')).map((r) => r.version)).toEqual(['1.0.0', '0.9.0'])
  })

  it('sorts all releases newest version first with pre-releases below the final one', async () => {
    for (const version of ['1.10.0', '1.2.0', '1.2.0-rc1', '0.9.9', '1.2.0b2', '1.2.0.dev1']) {
      await createRelease(store, { projectName: 'tooling-core', version })
    }
    expect((await allReleases(store, 'tooling-core')).map((r) => r.version)).toEqual([
      '1.10.0',
      '1.2.0',
      '1.2.0-rc1',
      '1.2.0b2',
      '1.2.0.dev1',
      '1.0.0',
      '0.9.9',
    ])
  })

  it('falls back to part-wise ordering when a version does not follow the release syntax', async () => {
    for (const version of ['1.2.0-M1', '1.2.0', '1.10.0']) {
      await createRelease(store, { projectName: 'tooling-core', version })
    }
    expect((await allReleases(store, 'tooling-core')).map((r) => r.version)).toEqual(['1.10.0', '1.2.0-M1', '1.2.0', '1.0.0'])
  })

  it('groups releases in progress by phase before creation time', async () => {
    await createRelease(store, { projectName: 'tooling-core', version: '2.0.0', created: '2020-01-01T00:00:00Z' })
    await createRelease(store, { projectName: 'tooling-core', version: '2.3.0', created: '2019-01-01T00:00:00Z' })
    await createRelease(store, { projectName: 'tooling-core', version: '2.1.0', created: '2021-01-01T00:00:00Z' })
    await createRelease(store, { projectName: 'tooling-core', version: '2.2.0', created: '2022-01-01T00:00:00Z' })
    await advanceReleasePhase(store, 'tooling-core-2.1.0', 'RELEASE_CANDIDATE')
    await advanceReleasePhase(store, 'tooling-core-2.2.0', 'RELEASE_CANDIDATE')
    await advanceReleasePhase(store, 'tooling-core-2.2.0', 'RELEASE_PREVIEW')

    expect((await releasesInProgress(store, 'tooling-core')).map((r) => `${r.version}:${r.phase}`)).toEqual([
      '1.0.0:RELEASE_CANDIDATE_DRAFT',
      '2.0.0:RELEASE_CANDIDATE_DRAFT',
      '2.3.0:RELEASE_CANDIDATE_DRAFT',
      '2.1.0:RELEASE_CANDIDATE',
      '2.2.0:RELEASE_PREVIEW',
    ])
  })

  it('sets and clears the podling thread', async () => {
    const name = 'tooling-core-1.0.0'
    expect((await setPodlingThread(store, name, 'thread-42')).podlingThreadId).toBe('thread-42')
    expect((await getRelease(store, name)).podlingThreadId).toBe('thread-42')
    await setPodlingThread(store, name, null)
    expect((await getRelease(store, name)).podlingThreadId).toBeNull()
    await expect(setPodlingThread(store, 'tooling-core-9.9.9', 'thread-1')).rejects.toBeInstanceOf(NotFound)
  })

  it('collects unfinished releases of the projects a user takes part in', async () => {
    await createCommittee(store, { name: 'docs', members: ['alice'] })
    await createProject(store, { name: 'docs-site', committeeName: 'docs', fullName: 'Alpha Docs' })
    await createProject(store, { name: 'docs-archive', committeeName: 'docs', fullName: 'Zed Archive' })
    await createRelease(store, { projectName: 'docs-site', version: '2.0', created: '2025-01-01T00:00:00Z' })
    await createRelease(store, { projectName: 'tooling-core', version: '0.9.0', created: '2024-01-01T00:00:00Z' })
    await advanceReleasePhase(store, 'tooling-core-0.9.0', 'RELEASE_CANDIDATE')
    await createRelease(store, { projectName: 'tooling-core', version: '0.8.0', created: '2023-01-01T00:00:00Z' })
    for (const phase of ['RELEASE_CANDIDATE', 'RELEASE_PREVIEW', 'RELEASE'] as const) {
      await advanceReleasePhase(store, 'tooling-core-0.8.0', phase)
    }

    expect(await userProjects(store, 'alice')).toEqual([
      { name: 'docs-archive', displayName: 'Zed Archive' },
      { name: 'docs-site', displayName: 'Alpha Docs' },
      { name: 'tooling-core', displayName: 'tooling-core' },
    ])

    const unfinished = await unfinishedReleases(store, 'alice')
    expect(unfinished.map((u) => [u.projectName, u.displayName, u.releases.map((r) => r.version)])).toEqual([
      ['docs-site', 'Alpha Docs', ['2.0']],
      ['tooling-core', 'tooling-core', ['1.0.0', '0.9.0']],
    ])
    expect((await unfinishedReleases(store, 'bob')).map((u) => u.projectName)).toEqual(['tooling-core'])
    expect(await unfinishedReleases(store, 'carol')).toEqual([])
  })
})

describe('phase rules', () => {
  it('only allows the next phase', () => {
    expect(nextPhase('RELEASE_CANDIDATE_DRAFT')).toBe('RELEASE_CANDIDATE')
    expect(nextPhase('RELEASE')).toBeNull()
    expect(canAdvance('RELEASE_CANDIDATE', 'RELEASE_PREVIEW')).toBe(true)
    expect(canAdvance('RELEASE_CANDIDATE_DRAFT', 'RELEASE_PREVIEW')).toBe(false)
  })

  it('compares versions numerically', () => {
    expect(compareVersions('1.10', '1.9')).toBeGreaterThan(0)
    expect(compareVersions('2.0', '2.0')).toBe(0)
    expect(compareVersions('1.0', '1.0.0')).toBe(0)
    expect(compareVersions('2.0.0', '2.0.0rc1')).toBeGreaterThan(0)
    expect(compareVersions('2.0.0rc1', '2.0.0-beta')).toBeGreaterThan(0)
    expect(compareVersions('2.0.0.post1', '2.0.0')).toBeGreaterThan(0)
  })
})
