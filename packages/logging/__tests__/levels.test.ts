import { describe, expect, test } from 'vitest';
import { levels, getLevelName, isLevelEnabled, parseLevelName } from '../src/levels';

describe('levels', () => {
	test('should use Pino-compatible numbering', () => {
		expect(levels).toEqual({ debug: 10, info: 20, warn: 30, error: 40 });
	});

	test('getLevelName should invert the numbering', () => {
		expect(getLevelName(30)).toBe('warn');
	});

	test('isLevelEnabled should compare against the threshold', () => {
		expect(isLevelEnabled(levels.error, levels.warn)).toBe(true);
		expect(isLevelEnabled(levels.debug, levels.info)).toBe(false);
	});

	describe('parseLevelName()', () => {
		test('should accept names regardless of case and padding', () => {
			expect(parseLevelName(' DEBUG ')).toBe('debug');
		});

		test('should reject unknown names', () => {
			expect(parseLevelName('verbose')).toBeUndefined();
			expect(parseLevelName('toString')).toBeUndefined();
			expect(parseLevelName(undefined)).toBeUndefined();
		});
	});
});
