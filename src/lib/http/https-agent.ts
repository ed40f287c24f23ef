import https from 'https'

const agents = new Map<string, https.Agent>()

/**
 * Keep-alive pool tuned for a handful of rate-limited hosts.
 * - keepAlive: true (one TLS handshake per backend for a whole batch)
 * - maxSockets: 4 (requests to one backend are serial anyway)
 * - timeout: 60s (socket inactivity timeout)
 */
const DEFAULT_CONFIG: https.AgentOptions = {
  keepAlive: true,
  keepAliveMsecs: 1000,
  maxSockets: 4,
  maxFreeSockets: 2,
  timeout: 60000,
  scheduling: 'lifo',
}

/**
 * Returns the agent for this configuration, creating it on first use.
 *
 * @param options - Overrides for specific needs (e.g. timeout, maxSockets)
 */
export const getHttpsAgent = (options: https.AgentOptions = {}): https.Agent => {
  const finalConfig = { ...DEFAULT_CONFIG, ...options }

  // Identical configurations share one agent
  const key = JSON.stringify(finalConfig, Object.keys(finalConfig).sort())

  const existing = agents.get(key)
  if (existing) return existing

  const agent = new https.Agent(finalConfig)
  agents.set(key, agent)

  return agent
}

export const sharedHttpsAgent = getHttpsAgent()
