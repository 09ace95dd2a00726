export { ApplicationService } from './ApplicationService';
export type { ServiceDependencies, UseCaseScope, UseCaseDefinition } from './ApplicationService';
export { PropertyService } from './PropertyService';
export { WorkerService } from './WorkerService';
export { TenantRequestService } from './TenantRequestService';
export type { FileRequestCommand, OverdueQuery } from './TenantRequestService';
