import { describe, it, expect, vi, beforeEach } from 'vitest'

const { mockRedis, RedisMock } = vi.hoisted(() => {
  const mockRedis = {
    hgetall: vi.fn(),
    quit: vi.fn(),
    on: vi.fn(),
  }
  return {
    mockRedis,
    RedisMock: vi.fn().mockImplementation(function () {
      return mockRedis
    }),
  }
})

vi.mock('ioredis', () => ({ Redis: RedisMock }))

vi.mock('@env/index', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@env/index')>()
  return { env: { ...actual.env, CACHE_DRIVER: 'redis' } }
})

import { closeGeocodingEngine, getGeocodingEngine } from './make-geocoding-engine'

describe('geocoding engine lifecycle', () => {
  beforeEach(async () => {
    await closeGeocodingEngine()
    vi.clearAllMocks()
    mockRedis.hgetall.mockResolvedValue({})
    mockRedis.quit.mockResolvedValue('OK')
  })

  it('should not open the cache store when no engine was created', async () => {
    await closeGeocodingEngine()

    expect(RedisMock).not.toHaveBeenCalled()
    expect(mockRedis.quit).not.toHaveBeenCalled()
  })

  it('should open a lazy Redis connection and load the cache hash once', async () => {
    const first = await getGeocodingEngine()
    const second = await getGeocodingEngine()

    expect(first).toBe(second)
    expect(RedisMock).toHaveBeenCalledTimes(1)
    expect(RedisMock).toHaveBeenCalledWith(
      expect.objectContaining({ lazyConnect: true, connectionName: 'address-geocoder-cache' }),
    )
    expect(mockRedis.hgetall).toHaveBeenCalledWith('geocode:cache')
  })

  it('should quit the connection on close and build a new engine afterwards', async () => {
    const first = await getGeocodingEngine()

    await closeGeocodingEngine()

    expect(mockRedis.quit).toHaveBeenCalledTimes(1)
    await expect(getGeocodingEngine()).resolves.not.toBe(first)
    expect(RedisMock).toHaveBeenCalledTimes(2)
  })
})
