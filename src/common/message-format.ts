/**
 * Fragments for error messages. Every message built by the engine follows these rules:
 *
 * 1. Values are written in SQL literal style with `toSqlValue()`.
 *    For example: 'a string value', 1, NULL.
 * 2. SQL types are double quoted and upper case with `toSqlType()`.
 *    For example: "INT", "DECIMAL(10,0)".
 * 3. Identifier segments are wrapped in backticks with `toSqlId()`.
 *    For example: `namespaceA`.`funcB`, `tableC`.
 * 4. SQL statements are upper case with `toSqlStmt()`.
 *    For example: DESC PARTITION, DROP TEMPORARY FUNCTION.
 * 5. Configuration keys and datasource options are double quoted with
 *    `toSqlConf()` / `toDsOption()`. For example: "spark.sql.ansi.enabled".
 * 6. Values of options and configs are double quoted with `toSqlConfVal()`.
 *    For example: "true", "CORRECTED".
 * 7. Expressions are double quoted with `toSqlExpr()`.
 *    For example: "(earnings + 1)".
 *
 * All functions are pure. None of them is idempotent: quoting twice quotes twice.
 */
import { type AbstractDataType, type DataType, dataTypeSql } from '../types/data-type.js';
import { type LiteralValue, createLiteral, fractionalText, literalSql } from '../types/literal.js';
import type { Expression } from '../expr/ast.js';
import { toPrettySql } from '../expr/pretty.js';
import { parseIdentifierPath, quoteIdentifier } from '../util/identifier.js';
import { createLogger } from './logger.js';
import type { QueryContext } from './query-context.js';

const log = createLogger('format');

/** Leading path segment the analyzer gives subqueries the user did not name */
export const AUTO_GENERATED_SUBQUERY_NAME = '__auto_generated_subquery_name';

function quoteByDefault(elem: string): string {
	return `"${elem}"`;
}

/**
 * SQL text of a value of the given type. NULL for null values; NaN, Infinity and
 * -Infinity for non-finite FLOAT and DOUBLE values; the canonical literal otherwise,
 * except that FLOAT values appear as plain numbers.
 * @throws TypeMismatchError when the value cannot be represented by the type
 */
export function toSqlValue(value: LiteralValue, dataType: DataType): string {
	const literal = createLiteral(value, dataType);
	if (value === null) return 'NULL';

	if ((dataType.kind === 'float' || dataType.kind === 'double') && typeof value === 'number') {
		if (Number.isNaN(value)) return 'NaN';
		if (value === Infinity) return 'Infinity';
		if (value === -Infinity) return '-Infinity';
		return dataType.kind === 'float' ? fractionalText(value) : literalSql(literal);
	}
	return literalSql(literal);
}

export function toSqlStmt(text: string): string {
	return text.toUpperCase();
}

/**
 * Backtick-quoted identifier path. A leading auto-generated subquery name is dropped
 * when other segments follow it. Text input is split with `parseIdentifierPath`,
 * whose syntax errors propagate.
 */
export function toSqlId(parts: readonly string[]): string;
export function toSqlId(text: string): string;
export function toSqlId(input: string | readonly string[]): string {
	const parts = typeof input === 'string' ? parseIdentifierPath(input) : input;
	let cleaned = parts;
	if (parts.length > 1 && parts[0] === AUTO_GENERATED_SUBQUERY_NAME) {
		log('Dropping generated subquery name from %o', parts);
		cleaned = parts.slice(1);
	}
	return cleaned.map(quoteIdentifier).join('.');
}

/**
 * Double-quoted, upper case type name. Type collections become an alternation:
 * `("INT" or "STRING")`.
 */
export function toSqlType(type: AbstractDataType): string;
export function toSqlType(text: string): string;
export function toSqlType(type: AbstractDataType | string): string {
	if (typeof type === 'string') {
		return quoteByDefault(type.toUpperCase());
	}
	switch (type.kind) {
		case 'collection':
			return `(${type.types.map(t => toSqlType(t)).join(' or ')})`;
		case 'abstract':
			return quoteByDefault(type.simpleString.toUpperCase());
		default:
			return quoteByDefault(dataTypeSql(type));
	}
}

export function toSqlConf(conf: string): string {
	return quoteByDefault(conf);
}

export function toSqlConfVal(conf: string): string {
	return quoteByDefault(conf);
}

export function toDsOption(option: string): string {
	return quoteByDefault(option);
}

export function toSqlSchema(schema: string): string {
	return quoteByDefault(schema);
}

export function toSqlExpr(expr: Expression): string {
	return quoteByDefault(toPrettySql(expr));
}

export function getSummary(context?: QueryContext | null): string {
	return context ? context.summary : '';
}

/** The context as a list, for callers that report any number of contexts */
export function getQueryContext(context?: QueryContext | null): QueryContext[] {
	return context ? [context] : [];
}
