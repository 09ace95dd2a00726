/**
 * rental-repairs-core - Property Aggregate
 *
 * A rental property, its units and the tenants living in them. The property is
 * the consistency boundary for request creation: {@link Property.fileRequest}
 * is the only way to create a {@link TenantRequest}, so every request belongs
 * to exactly one property and is filed by one of its tenants.
 *
 * @module domain/property/Property
 */

import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import type { Principal } from '../authorization';
import { AggregateRoot } from '../events';
import { InvariantViolationException } from '../exceptions';
import { FileRequestInput, TenantRequest } from '../tenant-request';
import { EmailSchema, IdentifierSchema, NonEmptyTextSchema, validateInput } from '../validation';
import {
  PropertyActivated,
  PropertyDeactivated,
  PropertyRegistered,
  TenantRegistered,
} from './events';

export interface Address {
  street: string;
  city: string;
  postalCode: string;
}

/**
 * A tenant of one unit. Entity inside the Property aggregate.
 */
export interface Tenant {
  readonly id: string;
  readonly propertyId: string;
  readonly email: string;
  readonly fullName: string;
  readonly unitNumber: string;
  readonly registeredAt: Date;
}

export interface PropertySnapshot {
  id: string;
  code: string;
  name: string;
  address: Address;
  city: string;
  managerId: string;
  units: string[];
  tenants: Tenant[];
  requestIds: string[];
  isActive: boolean;
  deactivationReason: string | null;
  registeredAt: Date;
}

const UnitNumberSchema = z
  .string()
  .trim()
  .min(1, 'cannot be empty')
  .max(10, 'must be at most 10 characters')
  .regex(/^[A-Za-z0-9\- ]+$/, 'may only contain letters, digits, spaces and dashes');

export const RegisterPropertySchema = z.object({
  code: z
    .string()
    .trim()
    .toUpperCase()
    .regex(/^[A-Z0-9-]{2,20}$/, 'must be 2-20 letters, digits or dashes'),
  name: NonEmptyTextSchema(200),
  address: z.object({
    street: NonEmptyTextSchema(200),
    city: NonEmptyTextSchema(100),
    postalCode: NonEmptyTextSchema(20),
  }),
  managerId: IdentifierSchema,
  units: z
    .array(UnitNumberSchema)
    .min(1, 'at least one unit is required')
    .refine((units) => new Set(units).size === units.length, 'unit numbers must be unique'),
});

export type RegisterPropertyInput = z.input<typeof RegisterPropertySchema>;

export const RegisterTenantSchema = z.object({
  email: EmailSchema,
  fullName: NonEmptyTextSchema(120),
  unitNumber: UnitNumberSchema,
});

export type RegisterTenantInput = z.input<typeof RegisterTenantSchema>;

export class Property extends AggregateRoot {
  private constructor(
    private props: PropertySnapshot,
    version: number,
  ) {
    super(version);
  }

  static register(input: RegisterPropertyInput, now: Date): Property {
    const data = validateInput(RegisterPropertySchema, input, 'Invalid property registration');
    const property = new Property(
      {
        id: uuidv4(),
        code: data.code,
        name: data.name,
        address: data.address,
        city: data.address.city,
        managerId: data.managerId,
        units: data.units,
        tenants: [],
        requestIds: [],
        isActive: true,
        deactivationReason: null,
        registeredAt: now,
      },
      0,
    );

    property.raiseEvent(
      new PropertyRegistered(
        {
          propertyId: property.id,
          code: data.code,
          name: data.name,
          city: data.address.city,
          managerId: data.managerId,
          units: [...data.units],
        },
        now,
      ),
    );
    return property;
  }

  static fromSnapshot(snapshot: PropertySnapshot, version: number): Property {
    return new Property(structuredClone(snapshot), version);
  }

  toSnapshot(): PropertySnapshot {
    return structuredClone(this.props);
  }

  get id(): string {
    return this.props.id;
  }

  get code(): string {
    return this.props.code;
  }

  get name(): string {
    return this.props.name;
  }

  get address(): Readonly<Address> {
    return this.props.address;
  }

  get city(): string {
    return this.props.city;
  }

  get managerId(): string {
    return this.props.managerId;
  }

  get units(): readonly string[] {
    return this.props.units;
  }

  get tenants(): readonly Tenant[] {
    return this.props.tenants;
  }

  get requestIds(): readonly string[] {
    return this.props.requestIds;
  }

  get isActive(): boolean {
    return this.props.isActive;
  }

  get deactivationReason(): string | null {
    return this.props.deactivationReason;
  }

  get registeredAt(): Date {
    return this.props.registeredAt;
  }

  findTenant(tenantId: string): Tenant | undefined {
    return this.props.tenants.find((tenant) => tenant.id === tenantId);
  }

  isUnitAvailable(unitNumber: string): boolean {
    return (
      this.props.units.includes(unitNumber) &&
      !this.props.tenants.some((tenant) => tenant.unitNumber === unitNumber)
    );
  }

  availableUnits(): string[] {
    return this.props.units.filter((unit) => this.isUnitAvailable(unit));
  }

  registerTenant(input: RegisterTenantInput, now: Date): Tenant {
    const data = validateInput(RegisterTenantSchema, input, 'Invalid tenant registration');
    this.ensureActive();

    if (!this.props.units.includes(data.unitNumber)) {
      throw this.violation('UnknownUnit', `Unit ${data.unitNumber} does not exist`, 'unitNumber');
    }
    if (!this.isUnitAvailable(data.unitNumber)) {
      throw this.violation('UnitOccupied', `Unit ${data.unitNumber} is occupied`, 'unitNumber');
    }
    if (this.props.tenants.some((tenant) => tenant.email === data.email)) {
      throw this.violation(
        'DuplicateTenantEmail',
        `A tenant with email ${data.email} is already registered`,
        'email',
      );
    }

    const tenant: Tenant = {
      id: uuidv4(),
      propertyId: this.id,
      email: data.email,
      fullName: data.fullName,
      unitNumber: data.unitNumber,
      registeredAt: now,
    };
    this.props.tenants.push(tenant);

    this.raiseEvent(
      new TenantRegistered(
        {
          propertyId: this.id,
          tenantId: tenant.id,
          email: tenant.email,
          fullName: tenant.fullName,
          unitNumber: tenant.unitNumber,
        },
        now,
      ),
    );
    return tenant;
  }

  /**
   * Create a maintenance request for one of this property's tenants.
   *
   * @throws InvariantViolationException when the property is inactive or the
   *   tenant does not live here
   */
  fileRequest(input: FileRequestInput, filedBy: Principal, now: Date): TenantRequest {
    this.ensureActive();
    const tenant = this.findTenant(input.tenantId.trim());
    if (tenant === undefined) {
      throw this.violation(
        'TenantNotInProperty',
        `Tenant ${input.tenantId} is not registered at property ${this.id}`,
        'tenantId',
      );
    }

    const request = TenantRequest.create(
      { propertyId: this.id, unitNumber: tenant.unitNumber, filedBy },
      { ...input, tenantId: tenant.id },
      now,
    );
    this.props.requestIds.push(request.id);
    return request;
  }

  deactivate(reason: string, now: Date): void {
    const reasonValue = validateInput(NonEmptyTextSchema(500), reason, 'Invalid deactivation reason');
    if (!this.props.isActive) {
      return;
    }
    this.props.isActive = false;
    this.props.deactivationReason = reasonValue;
    this.raiseEvent(new PropertyDeactivated({ propertyId: this.id, reason: reasonValue }, now));
  }

  activate(now: Date): void {
    if (this.props.isActive) {
      return;
    }
    this.props.isActive = true;
    this.props.deactivationReason = null;
    this.raiseEvent(new PropertyActivated({ propertyId: this.id }, now));
  }

  private ensureActive(): void {
    if (!this.props.isActive) {
      throw this.violation('PropertyInactive', `Property ${this.id} is not active`, 'isActive');
    }
  }

  private violation(rule: string, message: string, field: string): InvariantViolationException {
    return new InvariantViolationException(rule, 'Property', this.id, message, field);
  }
}
