import { MisuseError } from '../common/errors.js';
import { type DataType, DataTypes } from '../types/data-type.js';
import { type Literal, type LiteralValue, createLiteral } from '../types/literal.js';

export type BinaryOperator =
	| '+' | '-' | '*' | '/' | '%'
	| '=' | '<>' | '<' | '<=' | '>' | '>='
	| 'AND' | 'OR' | '||';

export type UnaryOperator = '-' | 'NOT';

/** Reference to a column, possibly qualified (`db.tbl.col`) */
export interface ColumnExpr {
	type: 'column';
	nameParts: readonly string[];
}

export interface LiteralExpr {
	type: 'literal';
	literal: Literal;
}

export interface BinaryExpr {
	type: 'binary';
	operator: BinaryOperator;
	left: Expression;
	right: Expression;
}

export interface UnaryExpr {
	type: 'unary';
	operator: UnaryOperator;
	expr: Expression;
}

export interface IsNullExpr {
	type: 'isNull';
	expr: Expression;
	negated: boolean;
}

export interface FunctionExpr {
	type: 'function';
	name: string;
	args: readonly Expression[];
	distinct?: boolean;
}

/**
 * A type conversion. `userSpecified` is false for casts the engine inserted
 * during analysis; those are hidden when the expression is shown to a user.
 */
export interface CastExpr {
	type: 'cast';
	expr: Expression;
	targetType: DataType;
	userSpecified: boolean;
}

export interface AliasExpr {
	type: 'alias';
	expr: Expression;
	name: string;
}

export type Expression =
	| ColumnExpr
	| LiteralExpr
	| BinaryExpr
	| UnaryExpr
	| IsNullExpr
	| FunctionExpr
	| CastExpr
	| AliasExpr;

// --- Builders ---

export function col(...nameParts: string[]): ColumnExpr {
	return { type: 'column', nameParts };
}

/**
 * Literal expression. Without an explicit type, the type is inferred from the value:
 * whole numbers in 32-bit range are INT, other whole numbers and bigints BIGINT,
 * fractional numbers DOUBLE, Dates TIMESTAMP.
 */
export function lit(value: LiteralValue, dataType: DataType = inferDataType(value)): LiteralExpr {
	return { type: 'literal', literal: createLiteral(value, dataType) };
}

export function binary(operator: BinaryOperator, left: Expression, right: Expression): BinaryExpr {
	return { type: 'binary', operator, left, right };
}

export function neg(expr: Expression): UnaryExpr {
	return { type: 'unary', operator: '-', expr };
}

export function not(expr: Expression): UnaryExpr {
	return { type: 'unary', operator: 'NOT', expr };
}

export function isNull(expr: Expression): IsNullExpr {
	return { type: 'isNull', expr, negated: false };
}

export function isNotNull(expr: Expression): IsNullExpr {
	return { type: 'isNull', expr, negated: true };
}

export function fn(name: string, args: readonly Expression[], distinct: boolean = false): FunctionExpr {
	return { type: 'function', name, args, distinct };
}

export function cast(expr: Expression, targetType: DataType, userSpecified: boolean = true): CastExpr {
	return { type: 'cast', expr, targetType, userSpecified };
}

export function alias(expr: Expression, name: string): AliasExpr {
	return { type: 'alias', expr, name };
}

function inferDataType(value: LiteralValue): DataType {
	if (value === null) return DataTypes.NULL;
	if (typeof value === 'boolean') return DataTypes.BOOLEAN;
	if (typeof value === 'bigint') return DataTypes.LONG;
	if (typeof value === 'number') {
		if (!Number.isInteger(value)) return DataTypes.DOUBLE;
		return value >= -2147483648 && value <= 2147483647 ? DataTypes.INTEGER : DataTypes.LONG;
	}
	if (typeof value === 'string') return DataTypes.STRING;
	if (value instanceof Uint8Array) return DataTypes.BINARY;
	if (value instanceof Date) return DataTypes.TIMESTAMP;
	throw new MisuseError('Collection literals require an explicit data type');
}
