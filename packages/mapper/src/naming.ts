/**
 * Naming Matcher
 *
 * Decides whether a result column label refers to a property name.
 *
 * @example
 * ```typescript
 * columnNameMatches('user_id', 'userId');   // -> true
 * columnNameMatches('USERID', 'userId');    // -> true
 * columnNameMatches('user_id', 'userId', { caseSensitive: false, camelCaseToUnderscore: false }); // -> false
 * ```
 */

import type { NamingRules } from './types';

export const defaultNamingRules: NamingRules = Object.freeze({
	caseSensitive: false,
	camelCaseToUnderscore: true
});

/**
 * Convert camelCase to snake_case, keeping acronyms together.
 * e.g., 'parseXMLDocument' → 'parse_xml_document'
 */
export function camelToSnake(str: string): string {
	return str
		.replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2') // XMLDocument → XML_Document
		.replace(/([a-z\d])([A-Z])/g, '$1_$2') // parseXml → parse_Xml
		.toLowerCase();
}

/**
 * Pure. An empty label never matches.
 *
 * Case-insensitive mode with camel/underscore equivalence also ignores
 * underscores entirely, so `USER_ID`, `userid` and `user_id` all match `userId`.
 * Case-sensitive mode accepts the exact name or its lower snake_case form.
 */
export function columnNameMatches(
	label: string,
	propertyName: string,
	rules: NamingRules = defaultNamingRules
): boolean {
	if (label === '' || propertyName === '') {
		return false;
	}

	if (rules.caseSensitive) {
		return label === propertyName || (rules.camelCaseToUnderscore && label === camelToSnake(propertyName));
	}

	const lowerLabel = label.toLowerCase();
	const lowerName = propertyName.toLowerCase();
	if (lowerLabel === lowerName) {
		return true;
	}
	if (!rules.camelCaseToUnderscore) {
		return false;
	}
	return lowerLabel === camelToSnake(propertyName) || stripUnderscores(lowerLabel) === stripUnderscores(lowerName);
}

function stripUnderscores(name: string): string {
	return name.replaceAll('_', '');
}
