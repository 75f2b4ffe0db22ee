import { RELEASE_PHASES, ReleasePhase } from '../db/entities/Release.js'
import { InvalidPhaseTransition } from './errors.js'
import { moduleLogger } from '../logger.js'

const log = moduleLogger('phases')

export const PHASE_DESCRIPTIONS: Record<ReleasePhase, string> = {
  RELEASE_CANDIDATE_DRAFT: 'Composing the candidate draft',
  RELEASE_CANDIDATE: 'Voting on the candidate',
  RELEASE_PREVIEW: 'Finishing the release after a passed vote',
  RELEASE: 'Published',
}

export function phaseIndex(phase: ReleasePhase): number {
  return RELEASE_PHASES.indexOf(phase)
}

export function nextPhase(phase: ReleasePhase): ReleasePhase | null {
  return RELEASE_PHASES[phaseIndex(phase) + 1] ?? null
}

export function isPublished(phase: ReleasePhase): boolean {
  return phase === 'RELEASE'
}

// Strictly forward, one step at a time
export function canAdvance(from: ReleasePhase, to: ReleasePhase): boolean {
  return nextPhase(from) === to
}

export function assertPhaseTransition(releaseName: string, from: ReleasePhase, to: ReleasePhase): void {
  if (canAdvance(from, to)) return
  log.warn({ releaseName, from, to }, 'Rejected release phase transition')
  throw new InvalidPhaseTransition(releaseName, from, to)
}
