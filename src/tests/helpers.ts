import 'reflect-metadata'
import { createDataSource } from '../db/data-source.js'
import { Store } from '../db/store.js'
import { createCommittee } from '../services/committees.js'
import { createProject } from '../services/projects.js'
import { createRelease } from '../services/releases.js'

export async function openTestStore(): Promise<Store> {
  return Store.open(createDataSource(':memory:'))
}

/** A committee "tooling", its project "tooling-core" and release 1.0.0 in draft. */
export async function seedRelease(store: Store, version = '1.0.0') {
  const committee = await createCommittee(store, { name: 'tooling', fullName: 'Tooling', members: ['alice'], committers: ['alice', 'bob'] })
  const project = await createProject(store, { name: 'tooling-core', committeeName: committee.name, programmingLanguages: ['typescript'] })
  const release = await createRelease(store, { projectName: project.name, version })
  return { committee, project, release }
}
