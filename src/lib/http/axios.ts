import axios, { AxiosInstance, CreateAxiosDefaults } from 'axios'
import https from 'https'
import { env } from '@env/index'
import { getHttpsAgent, sharedHttpsAgent } from './https-agent'

const AXIOS_DEFAULT_TIMEOUT_MS = 15000

export interface HttpClientConfig extends Omit<CreateAxiosDefaults, 'headers'> {
  headers?: Record<string, string>

  /**
   * Optional configuration for the underlying HTTPS Agent.
   * If omitted, the default shared agent is used.
   */
  agentOptions?: https.AgentOptions
}

/**
 * Creates an Axios instance on the shared connection pool.
 * Every client identifies itself with the configured User-Agent, which the OSM services require.
 */
export const createHttpClient = (config: HttpClientConfig = {}): AxiosInstance => {
  const { agentOptions, headers, ...axiosConfig } = config

  const httpsAgent = agentOptions ? getHttpsAgent(agentOptions) : sharedHttpsAgent

  return axios.create({
    httpsAgent,
    // Request timeout (distinct from socket timeout)
    timeout: config.timeout ?? AXIOS_DEFAULT_TIMEOUT_MS,
    ...axiosConfig,
    headers: {
      'User-Agent': env.GEOCODER_USER_AGENT,
      Accept: 'application/json',
      ...headers,
    },
  })
}
