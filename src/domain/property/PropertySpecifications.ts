/**
 * rental-repairs-core - Named Property Specifications
 */

import { FieldCriteria, FieldKey, ISpecification, Specifications } from '../specification';
import type { Property } from './Property';

function field(name: FieldKey<Property>): FieldCriteria<Property> {
  return Specifications.field<Property>(name);
}

export const PropertySpecifications = {
  byId(id: string): ISpecification<Property> {
    return field('id').equals(id);
  },

  /** Codes are stored upper-cased */
  byCode(code: string): ISpecification<Property> {
    return field('code').equals(code.trim().toUpperCase());
  },

  inCity(city: string): ISpecification<Property> {
    return field('city').equals(city.trim());
  },

  active(): ISpecification<Property> {
    return field('isActive').equals(true);
  },

  managedBy(managerId: string): ISpecification<Property> {
    return field('managerId').equals(managerId);
  },
};
