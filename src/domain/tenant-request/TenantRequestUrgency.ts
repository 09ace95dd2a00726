/**
 * rental-repairs-core - Request Urgency
 */

import { ValidationException } from '../exceptions';

export enum TenantRequestUrgency {
  Low = 'Low',
  Normal = 'Normal',
  High = 'High',
  Critical = 'Critical',
  Emergency = 'Emergency',
}

export const DEFAULT_URGENCY = TenantRequestUrgency.Normal;

/**
 * Hours within which a request of this urgency should be resolved.
 */
export function expectedResolutionHours(urgency: TenantRequestUrgency): number {
  switch (urgency) {
    case TenantRequestUrgency.Low:
      return 168;
    case TenantRequestUrgency.Normal:
      return 72;
    case TenantRequestUrgency.High:
      return 24;
    case TenantRequestUrgency.Critical:
      return 4;
    case TenantRequestUrgency.Emergency:
      return 2;
  }
}

export function requiresImmediateAttention(urgency: TenantRequestUrgency): boolean {
  return urgency === TenantRequestUrgency.Critical || urgency === TenantRequestUrgency.Emergency;
}

/**
 * Case-insensitive parse.
 *
 * @throws ValidationException for an unknown level
 */
export function parseUrgency(text: string): TenantRequestUrgency {
  const wanted = text.trim().toLowerCase();
  const match = Object.values(TenantRequestUrgency).find((level) => level.toLowerCase() === wanted);
  if (match === undefined) {
    throw new ValidationException('Unknown urgency', {
      urgency: [`"${text}" is not one of ${Object.values(TenantRequestUrgency).join(', ')}`],
    });
  }
  return match;
}
