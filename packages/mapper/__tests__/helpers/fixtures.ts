import { field } from '../../src/field';

/**
 * Runs `fn` and returns the error it throws, failing when it throws nothing
 * or something other than `errorType`.
 */
export function captureError<E extends Error>(fn: () => unknown, errorType: new (...args: never[]) => E): E {
	try {
		fn();
	} catch (error) {
		if (error instanceof errorType) {
			return error;
		}
		throw error;
	}
	throw new Error(`Expected ${errorType.name} to be thrown`);
}

export class Thing {
	static columnNames = { uuid: 'something' };
	name = '';
	value = 0;
	uuid: string | undefined = undefined;
}

export class User {
	userId = 0;
	displayName = '';
}

export class Counter {
	count = 0;
}

export class Temperature {
	celsius = 0;

	get fahrenheit(): number {
		return (this.celsius * 9) / 5 + 32;
	}

	set label(value: string) {
		this.celsius = value.length;
	}
}

export class Wallet {
	static fields = {
		owner: field().string(),
		balance: field().custom<string>('money')
	};
	owner = '';
	balance = '';
}

export const SAMPLE_UUID = '3f1c2a9e-8b7d-4c6e-9a5f-0d1e2b3c4d5e';
