import { promises as fs } from 'fs'
import { z } from 'zod'
import { ProviderId } from '@constants/resolution-policy'
import { InvalidOverridesDocumentError } from '@use-cases/errors/invalid-overrides-document-error'

const manualOverrideSchema = z.object({
  lat: z.number().min(-90).max(90),
  lng: z.number().min(-180).max(180),
  display_name: z.string().default(''),
  provider: z.enum([ProviderId.MANUAL, ProviderId.MANUAL_CITY]).default(ProviderId.MANUAL),
  score: z.number().min(0).max(100).default(100),
})

const overridesDocumentSchema = z.record(z.string(), manualOverrideSchema)

export type ManualOverride = z.infer<typeof manualOverrideSchema>

export type ManualOverrides = ReadonlyMap<string, ManualOverride>

/**
 * Hand-placed coordinates keyed by `street||city||region`.
 */
export async function loadManualOverrides(filePath: string): Promise<ManualOverrides> {
  const raw = await fs.readFile(filePath, 'utf-8')

  let document: unknown
  try {
    document = JSON.parse(raw)
  } catch {
    throw new InvalidOverridesDocumentError(filePath)
  }

  const parsed = overridesDocumentSchema.safeParse(document)
  if (!parsed.success) {
    throw new InvalidOverridesDocumentError(filePath)
  }

  return new Map(Object.entries(parsed.data))
}
