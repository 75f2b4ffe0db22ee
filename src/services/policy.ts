import { ReleasePolicy } from '../db/entities/ReleasePolicy.js'
import type { Project } from '../db/entities/Project.js'
import { config } from '../config.js'

export type PolicyField = Exclude<keyof ReleasePolicy, 'id'>
export type PolicyValue<K extends PolicyField> = NonNullable<ReleasePolicy[K]>
export type PolicyPatch = { [K in PolicyField]?: ReleasePolicy[K] }
export type EffectivePolicy = { [K in PolicyField]: PolicyValue<K> }

export const DEFAULT_START_VOTE_TEMPLATE = `Hello {{committee}},

I would like to call a vote on releasing the following artifacts as
{{project}} {{version}}.

The release candidate page, including downloads, is at:

  {{review_url}}

The artifacts come from revision {{revision}}.

Please review the release candidate and vote accordingly.

[ ] +1 Release this package
[ ] +0 Abstain
[ ] -1 Do not release this package (please give specific reasons)

The vote is open for {{duration}} hours.
{{#if checklist}}
Checklist for reference:

{{checklist}}
{{/if}}
Thanks,
{{name}}`

export const DEFAULT_ANNOUNCE_RELEASE_TEMPLATE = `The {{committee}} committee is pleased to announce the release of
{{project}} {{version}}.

The release is available for download at:

  {{download_url}}

Thanks,
{{name}}`

export const DEFAULT_MIN_HOURS = 72

type PolicyDefaults = { [K in PolicyField]: (project: Project) => PolicyValue<K> }

// One entry per overridable field; nothing else in the codebase knows a default
const POLICY_DEFAULTS: PolicyDefaults = {
  mailtoAddresses: (p) => [`dev@${p.committeeName}.${config.mailDomain}`, `private@${p.committeeName}.${config.mailDomain}`],
  manualVote: () => false,
  minHours: () => DEFAULT_MIN_HOURS,
  releaseChecklist: () => '',
  startVoteTemplate: () => DEFAULT_START_VOTE_TEMPLATE,
  announceReleaseTemplate: () => DEFAULT_ANNOUNCE_RELEASE_TEMPLATE,
  binaryArtifactPaths: () => [],
  sourceArtifactPaths: () => [],
  githubRepositoryName: () => '',
  githubComposeWorkflowPath: () => [],
  githubVoteWorkflowPath: () => [],
  githubFinishWorkflowPath: () => [],
  strictChecking: () => false,
  pauseForRm: () => false,
}

export const POLICY_FIELDS = Object.keys(POLICY_DEFAULTS) as PolicyField[]

/**
 * The effective value of a policy field: the project's explicit setting when
 * it has a policy and the field is set, otherwise the default.
 *
 * Expects `project.releasePolicy` to be loaded; an unloaded relation reads as
 * "no policy".
 */
export function policyFieldWithDefault<K extends PolicyField>(project: Project, field: K): PolicyValue<K> {
  const explicit = project.releasePolicy?.[field]
  if (explicit !== null && explicit !== undefined) return explicit
  return POLICY_DEFAULTS[field](project)
}

export function effectivePolicy(project: Project): EffectivePolicy {
  return {
    mailtoAddresses: policyFieldWithDefault(project, 'mailtoAddresses'),
    manualVote: policyFieldWithDefault(project, 'manualVote'),
    minHours: policyFieldWithDefault(project, 'minHours'),
    releaseChecklist: policyFieldWithDefault(project, 'releaseChecklist'),
    startVoteTemplate: policyFieldWithDefault(project, 'startVoteTemplate'),
    announceReleaseTemplate: policyFieldWithDefault(project, 'announceReleaseTemplate'),
    binaryArtifactPaths: policyFieldWithDefault(project, 'binaryArtifactPaths'),
    sourceArtifactPaths: policyFieldWithDefault(project, 'sourceArtifactPaths'),
    githubRepositoryName: policyFieldWithDefault(project, 'githubRepositoryName'),
    githubComposeWorkflowPath: policyFieldWithDefault(project, 'githubComposeWorkflowPath'),
    githubVoteWorkflowPath: policyFieldWithDefault(project, 'githubVoteWorkflowPath'),
    githubFinishWorkflowPath: policyFieldWithDefault(project, 'githubFinishWorkflowPath'),
    strictChecking: policyFieldWithDefault(project, 'strictChecking'),
    pauseForRm: policyFieldWithDefault(project, 'pauseForRm'),
  }
}

export const policyStartVoteTemplate = (project: Project) => policyFieldWithDefault(project, 'startVoteTemplate')
export const policyAnnounceReleaseTemplate = (project: Project) => policyFieldWithDefault(project, 'announceReleaseTemplate')
export const policyMailtoAddresses = (project: Project) => policyFieldWithDefault(project, 'mailtoAddresses')
export const policyMinHours = (project: Project) => policyFieldWithDefault(project, 'minHours')
export const policyManualVote = (project: Project) => policyFieldWithDefault(project, 'manualVote')
export const policyReleaseChecklist = (project: Project) => policyFieldWithDefault(project, 'releaseChecklist')
export const policyStrictChecking = (project: Project) => policyFieldWithDefault(project, 'strictChecking')

export type TemplateVars = Record<string, string | number | null | undefined>

export function renderTemplate(tpl: string, vars: TemplateVars): string {
  const value = (key: string) => {
    const v = vars[key.trim()]
    return v === null || v === undefined ? '' : String(v)
  }
  return tpl
    // drop {{#if var}}...{{/if}} blocks when var is empty
    .replace(/\{\{#if ([^}]+)\}\}([\s\S]*?)\{\{\/if\}\}/g, (_m, v: string, inner: string) => (value(v) ? inner : ''))
    .replace(/\{\{([A-Za-z_][A-Za-z0-9_]*)\}\}/g, (_m, key: string) => value(key))
}
