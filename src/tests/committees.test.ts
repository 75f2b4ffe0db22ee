import { Store } from '../db/store.js'
import {
  childCommittees,
  committeesWithCommitter,
  committeesWithMember,
  committeesWithParticipant,
  createCommittee,
  getCommittee,
  isPodling,
  setCommitteeParent,
  updateCommitteeMembership,
  userCommittees,
} from '../services/committees.js'
import { ConstraintViolation, NotFound } from '../services/errors.js'
import { openTestStore } from './helpers.js'

describe('committees', () => {
  let store: Store

  beforeEach(async () => {
    store = await openTestStore()
  })

  afterEach(async () => {
    await store.close()
  })

  it('stores membership lists sorted and without duplicates', async () => {
    await createCommittee(store, { name: 'incubator', members: ['zed', 'amy', 'zed'], committers: [' bob ', 'amy'] })
    const c = await getCommittee(store, 'incubator')
    expect(c.committeeMembers).toEqual(['amy', 'zed'])
    expect(c.committers).toEqual(['amy', 'bob'])
    expect(isPodling(c)).toBe(false)
  })

  it('rejects a duplicate name', async () => {
    await createCommittee(store, { name: 'tooling' })
    await expect(createCommittee(store, { name: 'tooling' })).rejects.toBeInstanceOf(ConstraintViolation)
  })

  it('links podlings to a parent and lists children', async () => {
    await createCommittee(store, { name: 'incubator' })
    await createCommittee(store, { name: 'widget', parentCommitteeName: 'incubator' })
    const widget = await getCommittee(store, 'widget')
    expect(isPodling(widget)).toBe(true)
    expect((await childCommittees(store, 'incubator')).map((c) => c.name)).toEqual(['widget'])
  })

  it('refuses parents that would form a cycle', async () => {
    await createCommittee(store, { name: 'a' })
    await createCommittee(store, { name: 'b', parentCommitteeName: 'a' })
    await createCommittee(store, { name: 'c', parentCommitteeName: 'b' })

    await expect(setCommitteeParent(store, 'a', 'c')).rejects.toThrow(/cycle/)
    await expect(setCommitteeParent(store, 'a', 'a')).rejects.toBeInstanceOf(ConstraintViolation)
    await expect(createCommittee(store, { name: 'd', parentCommitteeName: 'd' })).rejects.toThrow(/cycle/)
    expect((await getCommittee(store, 'a')).parentCommitteeName).toBeNull()
  })

  it('fails on a missing parent', async () => {
    await createCommittee(store, { name: 'a' })
    await expect(setCommitteeParent(store, 'a', 'ghost')).rejects.toBeInstanceOf(NotFound)
  })

  it('can clear a parent', async () => {
    await createCommittee(store, { name: 'incubator' })
    await createCommittee(store, { name: 'widget', parentCommitteeName: 'incubator' })
    const graduated = await setCommitteeParent(store, 'widget', null)
    expect(graduated.parentCommitteeName).toBeNull()
    expect(isPodling(graduated)).toBe(false)
    expect((await getCommittee(store, 'widget')).parentCommitteeName).toBeNull()
  })

  it('answers membership queries', async () => {
    await createCommittee(store, { name: 'alpha', members: ['alice'], committers: ['alice', 'carol'] })
    await createCommittee(store, { name: 'beta', members: ['bob'], committers: ['carol'] })
    await updateCommitteeMembership(store, 'beta', { members: ['bob', 'alice'] })

    expect((await committeesWithMember(store, 'alice')).map((c) => c.name)).toEqual(['alpha', 'beta'])
    expect((await committeesWithCommitter(store, 'carol')).map((c) => c.name)).toEqual(['alpha', 'beta'])
    expect((await committeesWithCommitter(store, 'bob')).map((c) => c.name)).toEqual([])
    expect((await committeesWithParticipant(store, 'bob')).map((c) => c.name)).toEqual(['beta'])
  })

  it('lists the committees a user takes part in with display names', async () => {
    await createCommittee(store, { name: 'alpha', fullName: 'Alpha Committee', members: ['alice'] })
    await createCommittee(store, { name: 'beta', committers: ['alice'] })
    await createCommittee(store, { name: 'gamma', members: ['bob'] })

    expect(await userCommittees(store, 'alice')).toEqual([
      { name: 'alpha', fullName: 'Alpha Committee' },
      { name: 'beta', fullName: 'beta' },
    ])
    expect(await userCommittees(store, 'nobody')).toEqual([])
  })
})
