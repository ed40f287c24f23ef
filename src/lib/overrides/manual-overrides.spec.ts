import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { InvalidOverridesDocumentError } from '@use-cases/errors/invalid-overrides-document-error'
import { loadManualOverrides } from './manual-overrides'

describe('loadManualOverrides', () => {
  let dir: string
  let filePath: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'geocode-overrides-'))
    filePath = join(dir, 'overrides.json')
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('should fill defaults for provider, display and score', async () => {
    await writeFile(
      filePath,
      JSON.stringify({
        'ул. Шипка 4||Казанлък||Стара Загора': { lat: 42.6191, lng: 25.3931 },
        '||Лом||Монтана': { lat: 43.8236, lng: 23.2375, provider: 'manual_city', display_name: 'Лом', score: 40 },
      }),
    )

    const overrides = await loadManualOverrides(filePath)

    expect(overrides.get('ул. Шипка 4||Казанлък||Стара Загора')).toEqual({
      lat: 42.6191,
      lng: 25.3931,
      display_name: '',
      provider: 'manual',
      score: 100,
    })
    expect(overrides.get('||Лом||Монтана')?.provider).toBe('manual_city')
  })

  it('should reject entries outside the coordinate range', async () => {
    await writeFile(filePath, JSON.stringify({ key: { lat: 142, lng: 25 } }))

    await expect(loadManualOverrides(filePath)).rejects.toBeInstanceOf(InvalidOverridesDocumentError)
  })

  it('should reject a document that is not JSON', async () => {
    await writeFile(filePath, 'lat=42')

    await expect(loadManualOverrides(filePath)).rejects.toBeInstanceOf(InvalidOverridesDocumentError)
  })
})
