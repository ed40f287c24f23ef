import { z } from 'zod'

const envSchema = z.object({
  // Environment
  NODE_ENV: z.enum(['development', 'staging', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['info', 'debug', 'warn', 'error', 'trace', 'silent']).default('info'),

  // App
  APP_NAME: z.string().default('Address Geocoder'),
  APP_PORT: z.coerce.number().default(3333),

  // Nominatim and Overpass reject anonymous clients
  GEOCODER_USER_AGENT: z.string().min(1).default('AddressGeocoder/1.0 (geocoder@example.com)'),

  // Country restriction applied to every provider
  COUNTRY_CODE: z.string().length(2).default('bg'),
  COUNTRY_NAME: z.string().min(1).default('България'),

  // Geocoding Providers
  NOMINATIM_API_URL: z.url().default('https://nominatim.openstreetmap.org'),
  OVERPASS_API_URL: z.url().default('https://overpass-api.de/api'),

  // Google Geocoding (commercial tier, disabled without a key)
  GOOGLE_GEOCODING_API_URL: z.url().default('https://maps.googleapis.com/maps/api'),
  GOOGLE_GEOCODING_API_KEY: z.string().min(1).optional(),

  // Resolution cache
  CACHE_DRIVER: z.enum(['file', 'redis']).default('file'),
  CACHE_FILE_PATH: z.string().min(1).default('geocode_cache.json'),

  // Redis (only read when CACHE_DRIVER=redis)
  REDIS_HOST: z.string().default('localhost'),
  REDIS_PORT: z.coerce.number().default(6379),
  REDIS_PASSWORD: z.string().optional(),
  REDIS_CACHE_HASH: z.string().min(1).default('geocode:cache'),
})

const _env = envSchema.safeParse(process.env)

if (!_env.success) {
  console.error('Invalid environment variables:', z.treeifyError(_env.error))

  throw new Error('Invalid environment variables. Please check your .env file or environment configuration.')
}

export const env = _env.data

export type Env = typeof env
