import type { ReconnectPolicy } from '../channels/types.js'

/** Default reconnect policy for chat transports */
export const DEFAULT_BACKOFF: ReconnectPolicy = {
  initialMs: 2000,
  maxMs: 60_000,
  factor: 2,
  jitter: 0.2,
  maxAttempts: 30,
}

/**
 * Delay before reconnect attempt `attempt` (zero-based): exponential growth
 * capped at `maxMs`, ± `jitter` of the result. Null once attempts run out.
 */
export function computeBackoff(
  policy: ReconnectPolicy,
  attempt: number,
  random: () => number = Math.random,
): number | null {
  if (attempt >= policy.maxAttempts) return null

  const capped = Math.min(policy.initialMs * policy.factor ** attempt, policy.maxMs)
  const offset = (random() * 2 - 1) * capped * policy.jitter
  return Math.round(capped + offset)
}

export function resolvePolicy(overrides?: Partial<ReconnectPolicy>): ReconnectPolicy {
  return { ...DEFAULT_BACKOFF, ...overrides }
}
