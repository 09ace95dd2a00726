/**
 * rental-repairs-core - Worker Specialization
 *
 * The closed set of trades a worker is qualified for and a request requires,
 * plus the deterministic inference of a request's required trade from its
 * description.
 *
 * @module domain/specialization/WorkerSpecialization
 */

import { z } from 'zod';
import { ValidationException } from '../exceptions';
import keywordTable from './specialization-keywords.json';

export enum WorkerSpecialization {
  General = 'General',
  Plumbing = 'Plumbing',
  Electrical = 'Electrical',
  HVAC = 'HVAC',
  Carpentry = 'Carpentry',
  Painting = 'Painting',
  Locksmith = 'Locksmith',
  ApplianceRepair = 'ApplianceRepair',
}

export const ALL_SPECIALIZATIONS: readonly WorkerSpecialization[] = Object.values(WorkerSpecialization);

/**
 * How General workers may cover requests that need a specific trade.
 *
 * - `never`: exact match only
 * - `when-no-exact-match`: General workers are offered only when no worker
 *   with the required trade is eligible
 * - `always`: General workers are always offered alongside exact matches
 */
export type GeneralFallbackPolicy = 'never' | 'when-no-exact-match' | 'always';

const SpecializationSchema = z.nativeEnum(WorkerSpecialization);

const KeywordTableSchema = z.object({
  priority: z.array(SpecializationSchema).nonempty(),
  keywords: z.record(SpecializationSchema, z.array(z.string().min(1)).nonempty()),
  aliases: z.record(z.string().min(1), SpecializationSchema),
});

type KeywordTable = z.infer<typeof KeywordTableSchema>;

function loadKeywordTable(raw: unknown): KeywordTable {
  const result = KeywordTableSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`specialization-keywords.json is invalid: ${result.error.message}`);
  }
  return result.data;
}

const table = loadKeywordTable(keywordTable);

const byLowerName = new Map<string, WorkerSpecialization>([
  ...ALL_SPECIALIZATIONS.map((value): [string, WorkerSpecialization] => [value.toLowerCase(), value]),
  ...Object.entries(table.aliases),
]);

function normalize(text: string): string {
  return text.trim().toLowerCase().replace(/\s+/g, ' ');
}

/**
 * Human-readable name.
 */
export function specializationDisplayName(specialization: WorkerSpecialization): string {
  switch (specialization) {
    case WorkerSpecialization.General:
      return 'General Maintenance';
    case WorkerSpecialization.Plumbing:
      return 'Plumbing';
    case WorkerSpecialization.Electrical:
      return 'Electrical';
    case WorkerSpecialization.HVAC:
      return 'HVAC';
    case WorkerSpecialization.Carpentry:
      return 'Carpentry';
    case WorkerSpecialization.Painting:
      return 'Painting';
    case WorkerSpecialization.Locksmith:
      return 'Locksmith';
    case WorkerSpecialization.ApplianceRepair:
      return 'Appliance Repair';
  }
}

export function specializationDescription(specialization: WorkerSpecialization): string {
  switch (specialization) {
    case WorkerSpecialization.General:
      return 'General repairs and maintenance that need no specific trade';
    case WorkerSpecialization.Plumbing:
      return 'Water supply, drains, fixtures and leaks';
    case WorkerSpecialization.Electrical:
      return 'Wiring, outlets, switches, lighting and breakers';
    case WorkerSpecialization.HVAC:
      return 'Heating, ventilation and air conditioning';
    case WorkerSpecialization.Carpentry:
      return 'Woodwork, cabinets, doors and shelving';
    case WorkerSpecialization.Painting:
      return 'Interior and exterior painting and finishing';
    case WorkerSpecialization.Locksmith:
      return 'Locks, keys and entry security';
    case WorkerSpecialization.ApplianceRepair:
      return 'Household appliances such as refrigerators, washers and ovens';
  }
}

/**
 * Parse a specialization name or alias, ignoring case and extra whitespace.
 * Returns undefined when the text names no specialization.
 */
export function tryParseSpecialization(text: string): WorkerSpecialization | undefined {
  return byLowerName.get(normalize(text));
}

/**
 * Parse a specialization name or alias.
 *
 * @throws ValidationException when the text names no specialization
 */
export function parseSpecialization(text: string): WorkerSpecialization {
  const parsed = tryParseSpecialization(text);
  if (parsed === undefined) {
    throw new ValidationException('Unknown specialization', {
      specialization: [`"${text}" is not a known specialization`],
    });
  }
  return parsed;
}

/**
 * Infer the specialization a request needs.
 *
 * A category hint that parses wins. Otherwise the description is searched for
 * trade keywords in priority order and the first hit wins. With no hit the
 * result is General. Never throws for ambiguous input.
 *
 * @example
 * ```typescript
 * determineSpecialization('leaking kitchen tap');          // Plumbing
 * determineSpecialization('door sticks', 'carpenter');     // Carpentry
 * determineSpecialization('something is wrong');           // General
 * ```
 */
export function determineSpecialization(
  description: string,
  categoryHint?: string | null,
): WorkerSpecialization {
  if (categoryHint) {
    const hinted = tryParseSpecialization(categoryHint);
    if (hinted !== undefined) {
      return hinted;
    }
  }

  const text = normalize(description);
  if (text.length === 0) {
    return WorkerSpecialization.General;
  }

  for (const specialization of table.priority) {
    const keywords = table.keywords[specialization] ?? [];
    if (keywords.some((keyword) => text.includes(keyword))) {
      return specialization;
    }
  }

  return WorkerSpecialization.General;
}

/**
 * Whether a worker with `workerSpecialization` may take work that needs
 * `required`. General covers other trades only when the caller allows it.
 */
export function canHandle(
  workerSpecialization: WorkerSpecialization,
  required: WorkerSpecialization,
  fallbackAllowed: boolean,
): boolean {
  if (workerSpecialization === required) {
    return true;
  }
  return fallbackAllowed && workerSpecialization === WorkerSpecialization.General;
}

/**
 * Apply the fallback policy. `exactMatches` is the number of eligible workers
 * with exactly the required trade.
 */
export function isGeneralFallbackAllowed(
  policy: GeneralFallbackPolicy,
  required: WorkerSpecialization,
  exactMatches: number,
): boolean {
  if (required === WorkerSpecialization.General) {
    return false;
  }
  switch (policy) {
    case 'never':
      return false;
    case 'always':
      return true;
    case 'when-no-exact-match':
      return exactMatches === 0;
  }
}
