/**
 * @fileoverview Authorization Exports
 */

export { PrincipalRole, AuthorizationAction, systemPrincipal } from './Principal';
export type { Principal, IPrincipalRoleLookup, AuthorizationResource } from './Principal';
export { isAuthorized, assertAuthorized } from './AuthorizationPolicy';
