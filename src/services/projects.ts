import { EntityManager, In } from 'typeorm'
import { Project } from '../db/entities/Project.js'
import { ReleasePolicy } from '../db/entities/ReleasePolicy.js'
import { Reader, Store, withReader } from '../db/store.js'
import { NotFound } from './errors.js'
import { POLICY_FIELDS, PolicyPatch } from './policy.js'
import { committeesWithParticipant } from './committees.js'
import { moduleLogger } from '../logger.js'

const log = moduleLogger('projects')

export interface ProjectInput {
  name: string
  committeeName: string
  fullName?: string | null
  description?: string | null
  category?: string | null
  programmingLanguages?: string[]
}

export type ProjectUpdate = Partial<Pick<ProjectInput, 'fullName' | 'description' | 'category' | 'programmingLanguages'>>

export async function demandProject(manager: EntityManager, name: string): Promise<Project> {
  const project = await manager.findOne(Project, { where: { name }, relations: { releasePolicy: true, committee: true } })
  if (!project) throw new NotFound('Project', name)
  return project
}

export async function createProject(store: Store, input: ProjectInput): Promise<Project> {
  const project = await store.transaction(async (m) => {
    await m.insert(Project, {
      name: input.name,
      committeeName: input.committeeName,
      fullName: input.fullName ?? null,
      description: input.description ?? null,
      category: input.category ?? null,
      programmingLanguages: input.programmingLanguages ?? [],
      releasePolicyId: null,
    })
    return demandProject(m, input.name)
  })
  log.info({ project: project.name, committee: project.committeeName }, 'Project created')
  return project
}

export function findProject(db: Reader, name: string): Promise<Project | null> {
  return withReader(db, (m) => m.findOne(Project, { where: { name }, relations: { releasePolicy: true, committee: true } }))
}

export function getProject(db: Reader, name: string): Promise<Project> {
  return withReader(db, (m) => demandProject(m, name))
}

export function listProjects(db: Reader, committeeName?: string): Promise<Project[]> {
  return withReader(db, (m) =>
    m.find(Project, {
      where: committeeName === undefined ? {} : { committeeName },
      relations: { releasePolicy: true },
      order: { name: 'ASC' },
    })
  )
}

export interface ProjectListing {
  name: string
  displayName: string
}

export function projectDisplayName(project: Pick<Project, 'name' | 'fullName'>): string {
  return project.fullName || project.name
}

/** Projects whose committee counts the user as a member or committer. */
export function userProjects(db: Reader, uid: string): Promise<ProjectListing[]> {
  return withReader(db, async (m) => {
    const committees = await committeesWithParticipant(m, uid)
    if (committees.length === 0) return []
    const projects = await m.find(Project, {
      where: { committeeName: In(committees.map((c) => c.name)) },
      order: { name: 'ASC' },
    })
    return projects.map((p) => ({ name: p.name, displayName: projectDisplayName(p) }))
  })
}

export async function updateProject(store: Store, name: string, update: ProjectUpdate): Promise<Project> {
  return store.transaction(async (m) => {
    await demandProject(m, name)
    const changes: Partial<Project> = {}
    if (update.fullName !== undefined) changes.fullName = update.fullName
    if (update.description !== undefined) changes.description = update.description
    if (update.category !== undefined) changes.category = update.category
    if (update.programmingLanguages !== undefined) changes.programmingLanguages = update.programmingLanguages
    if (Object.keys(changes).length > 0) await m.update(Project, { name }, changes)
    return demandProject(m, name)
  })
}

/**
 * Applies a partial policy update, creating the project's policy on first
 * use. `undefined` leaves a field alone; `null` unsets it so reads fall back
 * to the default.
 */
export async function setReleasePolicy(store: Store, projectName: string, patch: PolicyPatch): Promise<Project> {
  return store.transaction(async (m) => {
    const project = await demandProject(m, projectName)
    let policy = project.releasePolicy ?? null
    if (policy === null) {
      policy = await m.save(m.create(ReleasePolicy, emptyPolicy()))
      await m.update(Project, { name: projectName }, { releasePolicyId: policy.id })
    }
    for (const field of POLICY_FIELDS) {
      if (patch[field] !== undefined) Object.assign(policy, { [field]: patch[field] })
    }
    await m.save(policy)
    log.info({ project: projectName, fields: Object.keys(patch) }, 'Release policy updated')
    return demandProject(m, projectName)
  })
}

export async function clearReleasePolicy(store: Store, projectName: string): Promise<Project> {
  return store.transaction(async (m) => {
    const project = await demandProject(m, projectName)
    if (project.releasePolicyId !== null) {
      await m.update(Project, { name: projectName }, { releasePolicyId: null })
      await m.delete(ReleasePolicy, { id: project.releasePolicyId })
      log.info({ project: projectName }, 'Release policy removed')
    }
    return demandProject(m, projectName)
  })
}

function emptyPolicy(): Omit<ReleasePolicy, 'id'> {
  return {
    mailtoAddresses: null,
    manualVote: null,
    minHours: null,
    releaseChecklist: null,
    startVoteTemplate: null,
    announceReleaseTemplate: null,
    binaryArtifactPaths: null,
    sourceArtifactPaths: null,
    githubRepositoryName: null,
    githubComposeWorkflowPath: null,
    githubVoteWorkflowPath: null,
    githubFinishWorkflowPath: null,
    strictChecking: null,
    pauseForRm: null,
  }
}
