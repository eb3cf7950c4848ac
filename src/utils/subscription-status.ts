import { SubscriptionStatus } from '../types';

export const DAY_MS = 24 * 60 * 60 * 1000;

const TRANSITIONS: Readonly<Record<SubscriptionStatus, readonly SubscriptionStatus[]>> = {
  active: ['expired', 'revoked', 'blocked'],
  blocked: ['active', 'revoked'],
  expired: [],
  revoked: []
};

export const STATUS_LABELS: Readonly<Record<SubscriptionStatus, string>> = {
  active: 'активна',
  expired: 'истекла',
  blocked: 'заблокирована',
  revoked: 'отозвана'
};

export function canTransition(from: SubscriptionStatus, to: SubscriptionStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/** Целых дней до окончания, с округлением вниз */
export function daysLeft(endDate: Date, now: Date): number {
  return Math.floor((endDate.getTime() - now.getTime()) / DAY_MS);
}
