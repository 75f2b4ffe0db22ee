import { Store } from '../db/store.js'
import {
  distributionPlatform,
  distributionUrls,
  isDistributionPlatform,
  listDistributions,
  recordDistribution,
} from '../services/distributions.js'
import { advanceReleasePhase } from '../services/releases.js'
import { ConstraintViolation } from '../services/errors.js'
import { openTestStore, seedRelease } from './helpers.js'

const RELEASE = 'tooling-core-1.0.0'

describe('distribution urls', () => {
  it('fills the templates of a platform', () => {
    expect(distributionUrls('NPM', { package: 'tooling-core', version: '1.0.0' })).toEqual({
      ownerNamespace: '',
      apiUrl: 'https://registry.npmjs.org/tooling-core/1.0.0',
      webUrl: 'https://www.npmjs.com/package/tooling-core/v/1.0.0',
    })
  })

  it('falls back to the default owner namespace', () => {
    const urls = distributionUrls('DOCKER_HUB', { package: 'tooling', version: '1.0.0' })
    expect(urls.ownerNamespace).toBe('library')
    expect(urls.apiUrl).toBe('https://hub.docker.com/v2/namespaces/library/repositories/tooling/tags/1.0.0')
  })

  it('uses the staging template and drops the web page', () => {
    expect(distributionUrls('PYPI', { package: 'tooling', version: '1.0.0' }, true)).toEqual({
      ownerNamespace: '',
      apiUrl: 'https://test.pypi.org/pypi/tooling/1.0.0/json',
      webUrl: null,
    })
  })

  it('refuses platforms that need an owner or have no staging', () => {
    expect(() => distributionUrls('MAVEN', { package: 'core', version: '1.0.0' })).toThrow('Maven Central requires an owner namespace')
    expect(() => distributionUrls('NPM', { package: 'core', version: '1.0.0' }, true)).toThrow(ConstraintViolation)
  })

  it('knows its platforms', () => {
    expect(isDistributionPlatform('NPM_SCOPE')).toBe(true)
    expect(isDistributionPlatform('CRAN')).toBe(false)
    expect(distributionPlatform('ARTIFACT_HUB').requiresOwnerNamespace).toBe(true)
  })
})

describe('distributions', () => {
  let store: Store

  beforeEach(async () => {
    store = await openTestStore()
    await seedRelease(store)
  })

  afterEach(async () => {
    await store.close()
  })

  async function preview() {
    await advanceReleasePhase(store, RELEASE, 'RELEASE_CANDIDATE')
    await advanceReleasePhase(store, RELEASE, 'RELEASE_PREVIEW')
  }

  it('refuses to record a distribution for a draft', async () => {
    await expect(recordDistribution(store, { releaseName: RELEASE, platform: 'NPM', package: 'tooling-core', version: '1.0.0' })).rejects.toBeInstanceOf(
      ConstraintViolation
    )
    expect(await listDistributions(store, RELEASE)).toEqual([])
  })

  it('records a distribution once the vote has passed', async () => {
    await preview()
    const distribution = await recordDistribution(store, {
      releaseName: RELEASE,
      platform: 'NPM_SCOPE',
      ownerNamespace: 'tooling',
      package: 'core',
      version: '1.0.0',
      uploadDate: '2025-03-01T12:00:00+01:00',
    })
    expect(distribution.apiUrl).toBe('https://registry.npmjs.org/@tooling/core/1.0.0')

    const [stored] = await listDistributions(store, RELEASE)
    expect(stored.platform).toBe('NPM_SCOPE')
    expect(stored.staging).toBe(false)
    expect(stored.webUrl).toBe('https://www.npmjs.com/package/@tooling/core/v/1.0.0')
    expect(stored.uploadDate.toISOString()).toBe('2025-03-01T11:00:00.000Z')
  })

  it('rejects the same package recorded twice', async () => {
    await preview()
    const input = { releaseName: RELEASE, platform: 'PYPI' as const, package: 'tooling', version: '1.0.0' }
    await recordDistribution(store, input)
    await expect(recordDistribution(store, input)).rejects.toMatchObject({ kind: 'unique', table: 'distributions' })
    expect(await listDistributions(store, RELEASE)).toHaveLength(1)
  })
})
