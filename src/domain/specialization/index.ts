/**
 * @fileoverview Worker Specialization Exports
 */

export {
  WorkerSpecialization,
  ALL_SPECIALIZATIONS,
  specializationDisplayName,
  specializationDescription,
  parseSpecialization,
  tryParseSpecialization,
  determineSpecialization,
  canHandle,
  isGeneralFallbackAllowed,
} from './WorkerSpecialization';

export type { GeneralFallbackPolicy } from './WorkerSpecialization';
