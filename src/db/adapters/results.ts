import { z } from 'zod'
import { isTaskType, TaskType } from '../entities/Task.js'
import { UnknownResultShape } from '../../services/errors.js'

export const HashingCheckResult = z.object({
  kind: z.literal('HASHING_CHECK'),
  path: z.string(),
  algorithm: z.enum(['sha256', 'sha512']),
  digest: z.string(),
  matched: z.boolean(),
})

export const LicenseFilesResult = z.object({
  kind: z.literal('LICENSE_FILES'),
  path: z.string(),
  filesChecked: z.number().int().nonnegative(),
  missing: z.array(z.string()).default([]),
})

export const SignatureCheckResult = z.object({
  kind: z.literal('SIGNATURE_CHECK'),
  path: z.string(),
  keyFingerprint: z.string().nullable(),
  valid: z.boolean(),
  message: z.string().optional().default(''),
})

export const SbomGenerateResult = z.object({
  kind: z.literal('SBOM_GENERATE_CYCLONEDX'),
  path: z.string(),
  outputPath: z.string(),
  componentCount: z.number().int().nonnegative(),
})

export const SvnImportResult = z.object({
  kind: z.literal('SVN_IMPORT_FILES'),
  importedPaths: z.array(z.string()),
  revisionName: z.string().nullable().default(null),
})

export const VoteInitiateResult = z.object({
  kind: z.literal('VOTE_INITIATE'),
  messageId: z.string(),
  emailTo: z.string(),
  subject: z.string(),
  archiveUrl: z.string().nullable().default(null),
})

export const MessageSendResult = z.object({
  kind: z.literal('MESSAGE_SEND'),
  messageId: z.string(),
  recipient: z.string(),
})

export const DistributionWorkflowResult = z.object({
  kind: z.literal('DISTRIBUTION_WORKFLOW'),
  platform: z.string(),
  url: z.string(),
})

export const resultSchemas = {
  HASHING_CHECK: HashingCheckResult,
  LICENSE_FILES: LicenseFilesResult,
  SIGNATURE_CHECK: SignatureCheckResult,
  SBOM_GENERATE_CYCLONEDX: SbomGenerateResult,
  SVN_IMPORT_FILES: SvnImportResult,
  VOTE_INITIATE: VoteInitiateResult,
  MESSAGE_SEND: MessageSendResult,
  DISTRIBUTION_WORKFLOW: DistributionWorkflowResult,
} satisfies Record<TaskType, z.ZodTypeAny>

export type TaskResultFor<T extends TaskType> = z.infer<(typeof resultSchemas)[T]>
export type TaskResult = TaskResultFor<TaskType>
// What callers hand to the codec: defaults may be left out
export type TaskResultInput = z.input<(typeof resultSchemas)[TaskType]>

function schemaFor(taskType: string): z.ZodTypeAny {
  if (!isTaskType(taskType)) throw new UnknownResultShape(taskType, 'task type is not registered')
  return resultSchemas[taskType]
}

function parseAs(taskType: string, value: unknown): TaskResult {
  const schema = schemaFor(taskType)
  if (typeof value !== 'object' || value === null || !('kind' in value) || value.kind !== taskType) {
    throw new UnknownResultShape(taskType, 'payload is not tagged with its task type')
  }
  const parsed = schema.safeParse(value)
  if (!parsed.success) {
    throw new UnknownResultShape(taskType, parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'} ${i.message}`).join('; '))
  }
  return parsed.data
}

/** Serialises a result payload for the task type stored beside it. */
export function encodeResult(taskType: string, result: TaskResultInput): string {
  return JSON.stringify(parseAs(taskType, result))
}

export function decodeResult(taskType: string, raw: string | null): TaskResult | null {
  if (raw === null) return null
  let value: unknown
  try {
    value = JSON.parse(raw)
  } catch (e) {
    throw new UnknownResultShape(taskType, `stored payload is not JSON (${e instanceof Error ? e.message : String(e)})`)
  }
  return parseAs(taskType, value)
}
