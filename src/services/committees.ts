import { EntityManager } from 'typeorm'
import { Committee } from '../db/entities/Committee.js'
import { Reader, Store, withReader } from '../db/store.js'
import { ConstraintViolation, NotFound } from './errors.js'
import { moduleLogger } from '../logger.js'

const log = moduleLogger('committees')

export interface CommitteeInput {
  name: string
  fullName?: string | null
  members?: string[]
  committers?: string[]
  parentCommitteeName?: string | null
}

export interface MembershipUpdate {
  members?: string[]
  committers?: string[]
}

function uidSet(uids: string[] | undefined): string[] {
  return [...new Set((uids ?? []).map((u) => u.trim()).filter(Boolean))].sort()
}

export function isPodling(committee: Committee): boolean {
  return committee.parentCommitteeName !== null
}

async function demandCommittee(manager: EntityManager, name: string): Promise<Committee> {
  const committee = await manager.findOneBy(Committee, { name })
  if (!committee) throw new NotFound('Committee', name)
  return committee
}

// Walks up from the proposed parent; reaching `name` again means a cycle
async function assertNoCycle(manager: EntityManager, name: string, parentName: string): Promise<void> {
  const seen = new Set<string>()
  let current: string | null = parentName
  while (current !== null) {
    if (current === name) {
      throw new ConstraintViolation(`Committee ${name} cannot have ${parentName} as parent: cycle`, 'committees')
    }
    if (seen.has(current)) break
    seen.add(current)
    const row: Committee = await demandCommittee(manager, current)
    current = row.parentCommitteeName
  }
}

export async function createCommittee(store: Store, input: CommitteeInput): Promise<Committee> {
  const committee = await store.transaction(async (m) => {
    const parentName = input.parentCommitteeName ?? null
    if (parentName !== null) await assertNoCycle(m, input.name, parentName)
    const row = m.create(Committee, {
      name: input.name,
      fullName: input.fullName ?? null,
      committeeMembers: uidSet(input.members),
      committers: uidSet(input.committers),
      parentCommitteeName: parentName,
    })
    await m.insert(Committee, row)
    return row
  })
  log.info({ committee: committee.name, parent: committee.parentCommitteeName }, 'Committee created')
  return committee
}

export function findCommittee(db: Reader, name: string): Promise<Committee | null> {
  return withReader(db, (m) => m.findOneBy(Committee, { name }))
}

export function getCommittee(db: Reader, name: string): Promise<Committee> {
  return withReader(db, (m) => demandCommittee(m, name))
}

export function listCommittees(db: Reader): Promise<Committee[]> {
  return withReader(db, (m) => m.find(Committee, { order: { name: 'ASC' } }))
}

export function childCommittees(db: Reader, parentName: string): Promise<Committee[]> {
  return withReader(db, (m) => m.find(Committee, { where: { parentCommitteeName: parentName }, order: { name: 'ASC' } }))
}

export async function setCommitteeParent(store: Store, name: string, parentName: string | null): Promise<Committee> {
  return store.transaction(async (m) => {
    const committee = await demandCommittee(m, name)
    if (parentName !== null) await assertNoCycle(m, name, parentName)
    committee.parentCommitteeName = parentName
    await m.update(Committee, { name }, { parentCommitteeName: parentName })
    log.info({ committee: name, parent: parentName }, 'Committee parent changed')
    return committee
  })
}

export async function updateCommitteeMembership(store: Store, name: string, update: MembershipUpdate): Promise<Committee> {
  return store.transaction(async (m) => {
    const committee = await demandCommittee(m, name)
    if (update.members !== undefined) committee.committeeMembers = uidSet(update.members)
    if (update.committers !== undefined) committee.committers = uidSet(update.committers)
    await m.save(committee)
    log.info(
      { committee: name, members: committee.committeeMembers.length, committers: committee.committers.length },
      'Committee membership updated'
    )
    return committee
  })
}

type MembershipColumn = 'committee_members' | 'committers'

function committeesListing(db: Reader, uid: string, columns: MembershipColumn[]): Promise<Committee[]> {
  const clauses = columns.map((col) => `EXISTS (SELECT 1 FROM json_each(c.${col}) WHERE json_each.value = :uid)`)
  return withReader(db, (m) =>
    m
      .createQueryBuilder(Committee, 'c')
      .where(`(${clauses.join(' OR ')})`, { uid })
      .orderBy('c.name', 'ASC')
      .getMany()
  )
}

export function committeesWithMember(db: Reader, uid: string): Promise<Committee[]> {
  return committeesListing(db, uid, ['committee_members'])
}

export function committeesWithCommitter(db: Reader, uid: string): Promise<Committee[]> {
  return committeesListing(db, uid, ['committers'])
}

export function committeesWithParticipant(db: Reader, uid: string): Promise<Committee[]> {
  return committeesListing(db, uid, ['committee_members', 'committers'])
}

export interface CommitteeListing {
  name: string
  fullName: string
}

export async function userCommittees(db: Reader, uid: string): Promise<CommitteeListing[]> {
  const committees = await committeesWithParticipant(db, uid)
  return committees.map((c) => ({ name: c.name, fullName: c.fullName ?? c.name }))
}
