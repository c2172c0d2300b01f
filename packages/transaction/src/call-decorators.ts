import { IsolationLevel } from './isolation-level';
import type { TransactionDecorator } from './transaction-decorator';
import type { AsyncCall } from './types';

/** Per-call metadata; each key selects the decorator registered under it. */
export interface CallMetadata {
	transaction?: IsolationLevel;
}

export type CallMetadataKey = keyof CallMetadata;

export interface CallDecorator {
	decorate<A extends unknown[], R>(name: string, metadata: CallMetadata, call: AsyncCall<A, R>): AsyncCall<A, R>;
}

/**
 * Applies the decorators whose metadata keys a call carries. Decoration
 * happens once, when calls are set up; decorators registered later wrap
 * outermost.
 *
 * @example
 * ```typescript
 * const decorators = new CallDecorators().register('transaction', transactionCalls(transactions));
 * const save = decorators.decorate('Users.save', { transaction: IsolationLevel.UNSPECIFIED }, saveUser);
 * ```
 */
export class CallDecorators {
	private readonly decorators: Array<[CallMetadataKey, CallDecorator]> = [];

	public register(key: CallMetadataKey, decorator: CallDecorator): this {
		this.decorators.push([key, decorator]);
		return this;
	}

	public has(key: CallMetadataKey): boolean {
		return this.decorators.some(([registered]) => registered === key);
	}

	public decorate<A extends unknown[], R>(name: string, metadata: CallMetadata, call: AsyncCall<A, R>): AsyncCall<A, R> {
		let decorated = call;
		for (const [key, decorator] of this.decorators) {
			if (metadata[key] !== undefined) {
				decorated = decorator.decorate(name, metadata, decorated);
			}
		}
		return decorated;
	}
}

/**
 * Adapts a `TransactionDecorator` to the `transaction` metadata key.
 */
export function transactionCalls(transactions: TransactionDecorator): CallDecorator {
	return {
		decorate<A extends unknown[], R>(name: string, metadata: CallMetadata, call: AsyncCall<A, R>): AsyncCall<A, R> {
			return transactions.decorate(name, metadata.transaction ?? IsolationLevel.UNSPECIFIED, call);
		}
	};
}
