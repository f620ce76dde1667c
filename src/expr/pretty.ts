import { dataTypeSql } from '../types/data-type.js';
import { type Literal, decimalText, fractionalText, literalSql } from '../types/literal.js';
import { quoteIdentifier } from '../util/identifier.js';
import type * as AST from './ast.js';

/**
 * Canonical SQL text of an expression. Identifiers are backtick quoted and
 * literals carry their type markers, so the text reads back to the same expression.
 */
export function expressionSql(expr: AST.Expression): string {
	return stringify(expr, false);
}

/**
 * The form of an expression shown to users in messages:
 * - column names are dot joined without quoting
 * - string literals appear without quotes, numeric literals as plain numbers
 * - casts the engine inserted are omitted, as are aliases
 * - function names are lower case
 *
 *   toPrettySql(binary('+', col('earnings'), lit(1))) -> '(earnings + 1)'
 */
export function toPrettySql(expr: AST.Expression): string {
	return stringify(expr, true);
}

function stringify(expr: AST.Expression, pretty: boolean): string {
	switch (expr.type) {
		case 'column':
			return pretty ? expr.nameParts.join('.') : expr.nameParts.map(quoteIdentifier).join('.');

		case 'literal':
			return pretty ? prettyLiteral(expr.literal) : literalSql(expr.literal);

		case 'binary':
			return `(${stringify(expr.left, pretty)} ${expr.operator} ${stringify(expr.right, pretty)})`;

		case 'unary':
			return `(${expr.operator} ${stringify(expr.expr, pretty)})`;

		case 'isNull':
			return `(${stringify(expr.expr, pretty)} ${expr.negated ? 'IS NOT NULL' : 'IS NULL'})`;

		case 'function': {
			const args = expr.args.map(arg => stringify(arg, pretty)).join(', ');
			const name = pretty ? expr.name.toLowerCase() : expr.name.toUpperCase();
			return `${name}(${expr.distinct ? 'DISTINCT ' : ''}${args})`;
		}

		case 'cast':
			if (pretty && !expr.userSpecified) {
				return stringify(expr.expr, pretty);
			}
			return `CAST(${stringify(expr.expr, pretty)} AS ${dataTypeSql(expr.targetType)})`;

		case 'alias':
			return pretty
				? stringify(expr.expr, pretty)
				: `${stringify(expr.expr, pretty)} AS ${quoteIdentifier(expr.name)}`;
	}
}

function prettyLiteral({ value, dataType }: Literal): string {
	if (value === null) return 'NULL';
	switch (dataType.kind) {
		case 'string':
			if (typeof value === 'string') return value;
			break;
		case 'byte':
		case 'short':
		case 'integer':
		case 'long':
			if (typeof value === 'number' || typeof value === 'bigint') return value.toString();
			break;
		case 'float':
		case 'double':
			if (typeof value === 'number') return fractionalText(value);
			break;
		case 'decimal':
			return decimalText(value, dataType);
	}
	return literalSql({ value, dataType });
}
