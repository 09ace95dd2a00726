/**
 * rental-repairs-core - Property Events
 */

import { DomainEvent } from '../events';

export interface PropertyRegisteredPayload {
  propertyId: string;
  code: string;
  name: string;
  city: string;
  managerId: string;
  units: string[];
}

export class PropertyRegistered extends DomainEvent<PropertyRegisteredPayload> {
  readonly eventName = 'PropertyRegistered';
}

export interface TenantRegisteredPayload {
  propertyId: string;
  tenantId: string;
  email: string;
  fullName: string;
  unitNumber: string;
}

export class TenantRegistered extends DomainEvent<TenantRegisteredPayload> {
  readonly eventName = 'TenantRegistered';
}

export interface PropertyDeactivatedPayload {
  propertyId: string;
  reason: string;
}

export class PropertyDeactivated extends DomainEvent<PropertyDeactivatedPayload> {
  readonly eventName = 'PropertyDeactivated';
}

export interface PropertyActivatedPayload {
  propertyId: string;
}

export class PropertyActivated extends DomainEvent<PropertyActivatedPayload> {
  readonly eventName = 'PropertyActivated';
}
