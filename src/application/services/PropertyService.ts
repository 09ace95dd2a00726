/**
 * rental-repairs-core - Property Use Cases
 *
 * @module application/services/PropertyService
 */

import { AuthorizationAction, assertAuthorized } from '../../domain/authorization';
import { ValidationException } from '../../domain/exceptions';
import {
  Property,
  RegisterPropertyInput,
  RegisterTenantInput,
  Tenant,
} from '../../domain/property';
import { PROPERTY_REPOSITORY_TOKEN } from '../../domain/repository';
import { ApplicationService, ServiceDependencies } from './ApplicationService';

export class PropertyService extends ApplicationService {
  constructor(dependencies: ServiceDependencies) {
    super(dependencies);
  }

  /**
   * System only. Property codes are unique.
   */
  async registerProperty(actorId: string, input: RegisterPropertyInput): Promise<Property> {
    return this.execute(
      {
        name: 'registerProperty',
        actorId,
        action: AuthorizationAction.RegisterProperty,
        describe: (property) => ({ propertyId: property.id, code: property.code }),
      },
      async ({ unitOfWork, principal, now }) => {
        assertAuthorized(principal, AuthorizationAction.RegisterProperty, { aggregate: 'Property' });
        const property = Property.register(input, now);

        const properties = unitOfWork.getRepository(PROPERTY_REPOSITORY_TOKEN);
        if ((await properties.getByCode(property.code)) !== undefined) {
          throw new ValidationException('Invalid property registration', {
            code: [`property code ${property.code} is already registered`],
          });
        }
        await properties.add(property);
        return property;
      },
    );
  }

  async registerTenant(
    actorId: string,
    propertyId: string,
    input: RegisterTenantInput,
  ): Promise<Tenant> {
    return this.execute(
      {
        name: 'registerTenant',
        actorId,
        action: AuthorizationAction.RegisterTenant,
        describe: (tenant) => ({ propertyId, tenantId: tenant.id, unitNumber: tenant.unitNumber }),
      },
      async ({ unitOfWork, principal, now }) => {
        const properties = unitOfWork.getRepository(PROPERTY_REPOSITORY_TOKEN);
        const property = await this.load(properties, 'Property', propertyId);
        assertAuthorized(principal, AuthorizationAction.RegisterTenant, {
          aggregate: 'Property',
          aggregateId: property.id,
          propertyId: property.id,
        });

        const tenant = property.registerTenant(input, now);
        await properties.update(property);
        return tenant;
      },
    );
  }

  async deactivateProperty(actorId: string, propertyId: string, reason: string): Promise<Property> {
    return this.changeStatus('deactivateProperty', actorId, propertyId, (property, now) =>
      property.deactivate(reason, now),
    );
  }

  async activateProperty(actorId: string, propertyId: string): Promise<Property> {
    return this.changeStatus('activateProperty', actorId, propertyId, (property, now) =>
      property.activate(now),
    );
  }

  /**
   * System, or the property's manager.
   */
  async getProperty(actorId: string, propertyId: string): Promise<Property> {
    return this.execute(
      { name: 'getProperty', actorId, action: AuthorizationAction.ViewProperty },
      async ({ unitOfWork, principal }) => {
        const properties = unitOfWork.getRepository(PROPERTY_REPOSITORY_TOKEN);
        const property = await this.load(properties, 'Property', propertyId);
        assertAuthorized(principal, AuthorizationAction.ViewProperty, {
          aggregate: 'Property',
          aggregateId: property.id,
          propertyId: property.id,
        });
        return property;
      },
    );
  }

  private async changeStatus(
    name: string,
    actorId: string,
    propertyId: string,
    change: (property: Property, now: Date) => void,
  ): Promise<Property> {
    return this.execute(
      {
        name,
        actorId,
        action: AuthorizationAction.ChangePropertyStatus,
        describe: (property) => ({ propertyId: property.id, isActive: property.isActive }),
      },
      async ({ unitOfWork, principal, now }) => {
        const properties = unitOfWork.getRepository(PROPERTY_REPOSITORY_TOKEN);
        const property = await this.load(properties, 'Property', propertyId);
        assertAuthorized(principal, AuthorizationAction.ChangePropertyStatus, {
          aggregate: 'Property',
          aggregateId: property.id,
          propertyId: property.id,
        });

        change(property, now);
        await properties.update(property);
        return property;
      },
    );
  }
}
