import { MisuseError } from './errors.js';
import { createLogger } from './logger.js';

const log = createLogger('context');

/**
 * Describes the part of a query an error originates from.
 * Indices are zero-based offsets into the SQL text; `stopIndex` is inclusive.
 */
export interface QueryContext {
	/** Kind of the object the SQL text belongs to (e.g. 'VIEW'), or '' for a top-level query */
	readonly objectType: string;
	/** Name of that object, or '' */
	readonly objectName: string;
	readonly startIndex: number;
	readonly stopIndex: number;
	/** The SQL text between startIndex and stopIndex */
	readonly fragment: string;
	/** Human readable rendering of the fragment within its SQL text */
	readonly summary: string;
}

export interface SqlQueryContextOptions {
	sqlText: string;
	startIndex: number;
	stopIndex: number;
	objectType?: string;
	objectName?: string;
}

/**
 * Query context over a SQL text. The summary marks the fragment with carets:
 *
 * ```
 * == SQL (line 1, position 8) ==
 * SELECT a / b FROM t
 *        ^^^^^
 * ```
 */
export class SqlQueryContext implements QueryContext {
	readonly sqlText: string;
	readonly startIndex: number;
	readonly stopIndex: number;
	readonly objectType: string;
	readonly objectName: string;

	constructor(options: SqlQueryContextOptions) {
		const { sqlText, startIndex, stopIndex } = options;
		if (!Number.isInteger(startIndex) || !Number.isInteger(stopIndex)
			|| startIndex < 0 || startIndex > stopIndex || stopIndex >= sqlText.length) {
			throw new MisuseError(`Invalid query context range [${startIndex}, ${stopIndex}] for SQL text of length ${sqlText.length}`);
		}
		this.sqlText = sqlText;
		this.startIndex = startIndex;
		this.stopIndex = stopIndex;
		this.objectType = options.objectType ?? '';
		this.objectName = options.objectName ?? '';
		log('Created context %s %s [%d, %d]', this.objectType, this.objectName, startIndex, stopIndex);
	}

	get fragment(): string {
		return this.sqlText.slice(this.startIndex, this.stopIndex + 1);
	}

	/** 1-based line of the fragment start */
	get line(): number {
		return this.sqlText.slice(0, this.startIndex).split('\n').length;
	}

	/** 1-based position of the fragment start within its line */
	get position(): number {
		if (this.startIndex === 0) return 1;
		return this.startIndex - this.sqlText.lastIndexOf('\n', this.startIndex - 1);
	}

	get summary(): string {
		const object = this.objectType && this.objectName ? ` of ${this.objectType} ${this.objectName}` : '';
		const out = [`== SQL${object} (line ${this.line}, position ${this.position}) ==`];

		let lineStart = 0;
		for (const text of this.sqlText.split('\n')) {
			const from = Math.max(this.startIndex, lineStart) - lineStart;
			const to = Math.min(this.stopIndex, lineStart + text.length - 1) - lineStart;
			if (to >= from) {
				out.push(text, ' '.repeat(from) + '^'.repeat(to - from + 1));
			}
			lineStart += text.length + 1;
		}
		return out.join('\n');
	}
}
