/**
 * @rowbound/transaction - Declarative transactions
 *
 * Collapses nested transactional calls into one outer transaction and keeps
 * isolation levels consistent across the nesting.
 */

export { IsolationLevel, isIsolationLevel, isCompatibleLevel } from './isolation-level';
export type { TransactionHandle, HandleSupplier, TransactionFrame, AsyncCall } from './types';
export { TransactionIsolationConflictError } from './transaction-error';
export { FrameTransactionHandle, type FrameTransactionHandleOptions } from './frame-handle';
export { TransactionDecorator, type TransactionDecoratorOptions } from './transaction-decorator';
export {
	CallDecorators,
	transactionCalls,
	type CallDecorator,
	type CallMetadata,
	type CallMetadataKey
} from './call-decorators';
