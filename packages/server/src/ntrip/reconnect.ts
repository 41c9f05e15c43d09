import type { FailureKind } from '@castermon/shared';

export interface ReconnectPolicy {
  maxAttempts: number;
  retryDelayMs: number;
}

export const DEFAULT_RECONNECT_POLICY: ReconnectPolicy = {
  maxAttempts: 3,
  retryDelayMs: 10_000,
};

export type ReconnectDecision =
  | { action: 'retry'; delayMs: number; attempt: number }
  | { action: 'give_up'; reason: string };

const GIVE_UP_REASONS: Record<Exclude<FailureKind, 'network_error'>, string> = {
  idle_timeout: 'Mountpoint accepted the connection but sent no data',
  mountpoint_closed: 'Caster closed the stream',
  auth_failure: 'Caster rejected the request',
};

/**
 * Only transport failures are worth retrying; the other kinds describe conditions on the
 * caster side that a new connection will not change.
 */
export function decideReconnect(
  failureKind: FailureKind,
  reconnectAttempts: number,
  policy: ReconnectPolicy = DEFAULT_RECONNECT_POLICY,
  userStopped = false,
): ReconnectDecision {
  if (userStopped) return { action: 'give_up', reason: 'Stopped by user' };
  if (failureKind !== 'network_error') return { action: 'give_up', reason: GIVE_UP_REASONS[failureKind] };
  if (reconnectAttempts >= policy.maxAttempts) {
    return { action: 'give_up', reason: `Gave up after ${policy.maxAttempts} reconnect attempts` };
  }
  return { action: 'retry', delayMs: policy.retryDelayMs, attempt: reconnectAttempts + 1 };
}
