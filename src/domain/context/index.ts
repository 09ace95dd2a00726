/**
 * @fileoverview Operation context exports
 */

export { OperationContext } from './OperationContext';
export type { OperationContextData } from './OperationContext';
