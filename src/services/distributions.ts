import { Distribution } from '../db/entities/Distribution.js'
import { Reader, Store, withReader } from '../db/store.js'
import { normalizeTimestamp } from '../db/adapters/timestamps.js'
import { ConstraintViolation } from './errors.js'
import { demandRelease } from './releases.js'
import { moduleLogger } from '../logger.js'

const log = moduleLogger('distributions')

export const DISTRIBUTION_PLATFORMS = ['ARTIFACT_HUB', 'DOCKER_HUB', 'MAVEN', 'NPM', 'NPM_SCOPE', 'PYPI'] as const
export type DistributionPlatform = (typeof DISTRIBUTION_PLATFORMS)[number]

export interface PlatformConfig {
  name: string
  templateUrl: string
  templateStagingUrl: string | null
  webUrlTemplate: string | null
  requiresOwnerNamespace: boolean
  defaultOwnerNamespace: string | null
}

// Templates take {owner_namespace}, {package} and {version}
const PLATFORMS: Record<DistributionPlatform, PlatformConfig> = {
  ARTIFACT_HUB: {
    name: 'Artifact Hub',
    templateUrl: 'https://artifacthub.io/api/v1/packages/helm/{owner_namespace}/{package}/{version}',
    templateStagingUrl: 'https://staging.artifacthub.io/api/v1/packages/helm/{owner_namespace}/{package}/{version}',
    webUrlTemplate: 'https://artifacthub.io/packages/helm/{owner_namespace}/{package}/{version}',
    requiresOwnerNamespace: true,
    defaultOwnerNamespace: null,
  },
  DOCKER_HUB: {
    name: 'Docker Hub',
    templateUrl: 'https://hub.docker.com/v2/namespaces/{owner_namespace}/repositories/{package}/tags/{version}',
    templateStagingUrl: null,
    webUrlTemplate: 'https://hub.docker.com/r/{owner_namespace}/{package}',
    requiresOwnerNamespace: false,
    defaultOwnerNamespace: 'library',
  },
  MAVEN: {
    name: 'Maven Central',
    templateUrl: 'https://search.maven.org/solrsearch/select?q=g:{owner_namespace}+AND+a:{package}+AND+v:{version}&core=gav&rows=20&wt=json',
    templateStagingUrl: null,
    webUrlTemplate: 'https://central.sonatype.com/artifact/{owner_namespace}/{package}/{version}',
    requiresOwnerNamespace: true,
    defaultOwnerNamespace: null,
  },
  NPM: {
    name: 'npm',
    templateUrl: 'https://registry.npmjs.org/{package}/{version}',
    templateStagingUrl: null,
    webUrlTemplate: 'https://www.npmjs.com/package/{package}/v/{version}',
    requiresOwnerNamespace: false,
    defaultOwnerNamespace: null,
  },
  NPM_SCOPE: {
    name: 'npm (scoped)',
    templateUrl: 'https://registry.npmjs.org/@{owner_namespace}/{package}/{version}',
    templateStagingUrl: null,
    webUrlTemplate: 'https://www.npmjs.com/package/@{owner_namespace}/{package}/v/{version}',
    requiresOwnerNamespace: true,
    defaultOwnerNamespace: null,
  },
  PYPI: {
    name: 'PyPI',
    templateUrl: 'https://pypi.org/pypi/{package}/{version}/json',
    templateStagingUrl: 'https://test.pypi.org/pypi/{package}/{version}/json',
    webUrlTemplate: 'https://pypi.org/project/{package}/{version}/',
    requiresOwnerNamespace: false,
    defaultOwnerNamespace: null,
  },
}

export function isDistributionPlatform(value: string): value is DistributionPlatform {
  return (DISTRIBUTION_PLATFORMS as readonly string[]).includes(value)
}

export function distributionPlatform(platform: DistributionPlatform): PlatformConfig {
  return PLATFORMS[platform]
}

export interface PackageCoordinates {
  ownerNamespace?: string | null
  package: string
  version: string
}

export interface DistributionUrls {
  ownerNamespace: string
  apiUrl: string
  webUrl: string | null
}

function fill(template: string, owner: string, coords: PackageCoordinates): string {
  return template
    .replace(/\{owner_namespace\}/g, owner)
    .replace(/\{package\}/g, coords.package)
    .replace(/\{version\}/g, coords.version)
}

export function distributionUrls(platform: DistributionPlatform, coords: PackageCoordinates, staging = false): DistributionUrls {
  const cfg = distributionPlatform(platform)
  const owner = coords.ownerNamespace || cfg.defaultOwnerNamespace || ''
  if (cfg.requiresOwnerNamespace && !owner) {
    throw new ConstraintViolation(`${cfg.name} requires an owner namespace`, 'distributions')
  }
  const template = staging ? cfg.templateStagingUrl : cfg.templateUrl
  if (template === null) {
    throw new ConstraintViolation(`${cfg.name} has no staging environment`, 'distributions')
  }
  return {
    ownerNamespace: owner,
    apiUrl: fill(template, owner, coords),
    // staging uploads have no public page
    webUrl: !staging && cfg.webUrlTemplate ? fill(cfg.webUrlTemplate, owner, coords) : null,
  }
}

export interface DistributionInput extends PackageCoordinates {
  releaseName: string
  platform: DistributionPlatform
  staging?: boolean
  uploadDate?: Date | string
}

export async function recordDistribution(store: Store, input: DistributionInput): Promise<Distribution> {
  const staging = input.staging ?? false
  const urls = distributionUrls(input.platform, input, staging)
  const uploadDate = normalizeTimestamp(input.uploadDate ?? new Date())
  const distribution = await store.transaction(async (m) => {
    const release = await demandRelease(m, input.releaseName)
    if (release.phase !== 'RELEASE_PREVIEW' && release.phase !== 'RELEASE') {
      throw new ConstraintViolation(`Release ${release.name} is not ready for distribution (${release.phase})`, 'distributions')
    }
    const row = m.create(Distribution, {
      releaseName: release.name,
      platform: input.platform,
      ownerNamespace: urls.ownerNamespace,
      package: input.package,
      version: input.version,
      staging,
      uploadDate,
      apiUrl: urls.apiUrl,
      webUrl: urls.webUrl,
    })
    return m.save(row)
  })
  log.info({ release: input.releaseName, platform: input.platform, staging }, 'Distribution recorded')
  return distribution
}

export function listDistributions(db: Reader, releaseName: string): Promise<Distribution[]> {
  return withReader(db, (m) => m.find(Distribution, { where: { releaseName }, order: { id: 'ASC' } }))
}
