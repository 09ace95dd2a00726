/**
 * @fileoverview Property Exports
 */

export { Property, RegisterPropertySchema, RegisterTenantSchema } from './Property';
export type {
  Address,
  Tenant,
  PropertySnapshot,
  RegisterPropertyInput,
  RegisterTenantInput,
} from './Property';

export { PropertySpecifications } from './PropertySpecifications';

export {
  PropertyRegistered,
  TenantRegistered,
  PropertyDeactivated,
  PropertyActivated,
} from './events';
export type {
  PropertyRegisteredPayload,
  TenantRegisteredPayload,
  PropertyDeactivatedPayload,
  PropertyActivatedPayload,
} from './events';
