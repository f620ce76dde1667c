import { IdentifierSyntaxError } from '../common/errors.js';
import { createLogger } from '../common/logger.js';

const log = createLogger('identifier');
const errorLog = log.extend('error');

/**
 * Wraps a single identifier segment in backticks, doubling any backtick it contains.
 * Always quotes, regardless of whether the name would be a valid bare identifier.
 */
export function quoteIdentifier(name: string): string {
	return `\`${name.replace(/`/g, '``')}\``;
}

/**
 * Splits a dotted identifier path into its segments.
 *
 * Segments are separated by `.`. A segment may be wrapped in backticks, in which
 * case dots inside it are literal and a doubled backtick stands for one backtick:
 *
 *   parseIdentifierPath('db.`my.table`.`a``b`') -> ['db', 'my.table', 'a`b']
 *
 * Empty input yields a single empty segment.
 * @throws IdentifierSyntaxError for empty segments between dots, a leading or
 *   trailing dot, text following a closing backtick, a backtick opening after
 *   unquoted text, or an unterminated backtick.
 */
export function parseIdentifierPath(text: string): string[] {
	const parts: string[] = [];
	let current = '';
	let inBacktick = false;

	for (let i = 0; i < text.length; i++) {
		const ch = text[i];
		if (inBacktick) {
			if (ch !== '`') {
				current += ch;
			} else if (text[i + 1] === '`') {
				current += '`';
				i++;
			} else {
				inBacktick = false;
				// A closing backtick ends the segment
				if (i + 1 < text.length && text[i + 1] !== '.') {
					reject(text, i + 1);
				}
			}
		} else if (ch === '`') {
			if (current.length > 0) {
				reject(text, i);
			}
			inBacktick = true;
		} else if (ch === '.') {
			if (i === 0 || text[i - 1] === '.' || i === text.length - 1) {
				reject(text, i);
			}
			parts.push(current);
			current = '';
		} else {
			current += ch;
		}
	}

	if (inBacktick) {
		reject(text, text.length);
	}
	parts.push(current);
	return parts;
}

function reject(text: string, position: number): never {
	const error = new IdentifierSyntaxError(text, position);
	errorLog('Rejected identifier path %s at %d', text, position);
	throw error;
}
