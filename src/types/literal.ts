import { TypeMismatchError } from '../common/errors.js';
import { type DataType, type DecimalType, dataTypeSql } from './data-type.js';

/**
 * Runtime representation of a literal value.
 * Struct values are arrays ordered like the struct's fields; map values are Maps.
 */
export type LiteralValue =
	| null
	| boolean
	| number
	| bigint
	| string
	| Uint8Array
	| Date
	| readonly LiteralValue[]
	| ReadonlyMap<LiteralValue, LiteralValue>;

/** A value paired with the data type it is interpreted as. */
export interface Literal {
	readonly value: LiteralValue;
	readonly dataType: DataType;
}

const INTEGRAL_RANGES = {
	byte: [-128n, 127n],
	short: [-32768n, 32767n],
	integer: [-2147483648n, 2147483647n],
	long: [-9223372036854775808n, 9223372036854775807n],
} as const;

const INTEGRAL_SUFFIX = { byte: 'Y', short: 'S', integer: '', long: 'L' } as const;

const DECIMAL_PATTERN = /^-?\d+(?:\.\d+)?$/;
const NEGATIVE_ZERO_PATTERN = /^-0(?:\.0+)?$/;

/**
 * Creates a literal, checking that the value can be represented by the type.
 * A null value is accepted for every type.
 * @throws TypeMismatchError when the value does not fit the type
 */
export function createLiteral(value: LiteralValue, dataType: DataType): Literal {
	checkValue(value, dataType);
	return { value, dataType };
}

function checkValue(value: LiteralValue, type: DataType): void {
	if (value === null) return;

	switch (type.kind) {
		case 'null':
			return mismatch(value, type);
		case 'boolean':
			if (typeof value !== 'boolean') mismatch(value, type);
			return;
		case 'byte':
		case 'short':
		case 'integer':
		case 'long': {
			const [min, max] = INTEGRAL_RANGES[type.kind];
			const n = typeof value === 'bigint' ? value
				: typeof value === 'number' && Number.isSafeInteger(value) ? BigInt(value)
				: undefined;
			if (n === undefined || n < min || n > max) mismatch(value, type);
			return;
		}
		case 'float':
		case 'double':
			if (typeof value !== 'number') mismatch(value, type);
			return;
		case 'decimal':
			decimalText(value, type);
			return;
		case 'string':
			if (typeof value !== 'string') mismatch(value, type);
			return;
		case 'binary':
			if (!(value instanceof Uint8Array)) mismatch(value, type);
			return;
		case 'date':
		case 'timestamp':
			if (!(value instanceof Date) || !isSqlDate(value)) mismatch(value, type);
			return;
		case 'array': {
			if (!isArray(value)) return mismatch(value, type);
			const { elementType } = type;
			value.forEach(element => checkValue(element, elementType));
			return;
		}
		case 'map':
			if (!(value instanceof Map)) return mismatch(value, type);
			for (const [k, v] of value) {
				if (k === null) mismatch(value, type);
				checkValue(k, type.keyType);
				checkValue(v, type.valueType);
			}
			return;
		case 'struct': {
			if (!isArray(value) || value.length !== type.fields.length) return mismatch(value, type);
			const members = value;
			type.fields.forEach((field, i) => checkValue(members[i], field.dataType));
			return;
		}
	}
}

/**
 * Canonical SQL serialization of a literal, e.g. `'it\'s'`, `5L`, `1.5D`, `12.50BD`,
 * `DATE '2024-03-01'`, `ARRAY(1, 2)`.
 */
export function literalSql(literal: Literal): string {
	return valueSql(literal.value, literal.dataType);
}

function valueSql(value: LiteralValue, type: DataType): string {
	if (value === null) return 'NULL';

	switch (type.kind) {
		case 'boolean':
			if (typeof value === 'boolean') return value ? 'TRUE' : 'FALSE';
			break;
		case 'byte':
		case 'short':
		case 'integer':
		case 'long':
			if (typeof value === 'number' || typeof value === 'bigint') {
				return `${value.toString()}${INTEGRAL_SUFFIX[type.kind]}`;
			}
			break;
		case 'float':
			if (typeof value === 'number') {
				return Number.isFinite(value)
					? `CAST(${fractionalText(value)} AS FLOAT)`
					: `CAST('${fractionalText(value)}' AS FLOAT)`;
			}
			break;
		case 'double':
			if (typeof value === 'number') {
				return Number.isFinite(value)
					? `${fractionalText(value)}D`
					: `CAST('${fractionalText(value)}' AS DOUBLE)`;
			}
			break;
		case 'decimal':
			return `${decimalText(value, type)}BD`;
		case 'string':
			if (typeof value === 'string') return quoteString(value);
			break;
		case 'binary':
			if (value instanceof Uint8Array) {
				return `X'${Buffer.from(value).toString('hex').toUpperCase()}'`;
			}
			break;
		case 'date':
			if (value instanceof Date && isSqlDate(value)) return `DATE '${value.toISOString().slice(0, 10)}'`;
			break;
		case 'timestamp':
			if (value instanceof Date && isSqlDate(value)) {
				const iso = value.toISOString().replace('T', ' ').replace('Z', '');
				return `TIMESTAMP '${iso.endsWith('.000') ? iso.slice(0, -4) : iso}'`;
			}
			break;
		case 'array':
			if (isArray(value)) {
				const { elementType } = type;
				return `ARRAY(${value.map(e => valueSql(e, elementType)).join(', ')})`;
			}
			break;
		case 'map':
			if (value instanceof Map) {
				const { keyType, valueType } = type;
				const entries = [...value].map(([k, v]) =>
					`${valueSql(k, keyType)}, ${valueSql(v, valueType)}`);
				return `MAP(${entries.join(', ')})`;
			}
			break;
		case 'struct':
			if (isArray(value) && value.length === type.fields.length) {
				const members = value;
				const parts = type.fields.map((field, i) =>
					`${quoteString(field.name)}, ${valueSql(members[i], field.dataType)}`);
				return `NAMED_STRUCT(${parts.join(', ')})`;
			}
			break;
		case 'null':
			break;
	}
	return mismatch(value, type);
}

/**
 * Shortest round-trip text of a floating point number, always carrying a
 * fractional part or exponent: `1.0`, `0.1`, `1e+21`, `-0.0`, `NaN`, `Infinity`.
 */
export function fractionalText(value: number): string {
	if (Object.is(value, -0)) return '-0.0';
	const text = String(value);
	return Number.isFinite(value) && !/[.e]/.test(text) ? `${text}.0` : text;
}

/** Single-quotes a string, escaping backslashes and single quotes with a backslash. */
export function quoteString(text: string): string {
	return `'${text.replace(/[\\']/g, ch => `\\${ch}`)}'`;
}

/**
 * Decimal text with exactly `scale` fractional digits, checked against the type's precision.
 * @throws TypeMismatchError when the value is not a decimal number or does not fit
 */
export function decimalText(value: LiteralValue, type: DecimalType): string {
	let text: string;
	if (typeof value === 'number' && Number.isFinite(value)) {
		text = value.toFixed(type.scale);
		// toFixed switches to exponent notation from 1e21 up
		if (!DECIMAL_PATTERN.test(text)) return mismatch(value, type);
	} else if (typeof value === 'bigint') {
		text = type.scale > 0 ? `${value.toString()}.${'0'.repeat(type.scale)}` : value.toString();
	} else if (typeof value === 'string' && DECIMAL_PATTERN.test(value)) {
		const [whole, fraction = ''] = value.split('.');
		if (fraction.length > type.scale) return mismatch(value, type);
		text = type.scale > 0 ? `${whole}.${fraction.padEnd(type.scale, '0')}` : whole;
	} else {
		return mismatch(value, type);
	}

	if (NEGATIVE_ZERO_PATTERN.test(text)) {
		text = text.slice(1);
	}

	const integerDigits = text.replace(/^-/, '').split('.')[0].replace(/^0+(?=\d)/, '');
	if (integerDigits !== '0' && integerDigits.length > type.precision - type.scale) {
		return mismatch(value, type);
	}
	return text;
}

/** Valid Dates in years 0001 through 9999, which ISO text writes with four year digits */
function isSqlDate(value: Date): boolean {
	const year = value.getUTCFullYear();
	return year >= 1 && year <= 9999;
}

function isArray(value: LiteralValue): value is readonly LiteralValue[] {
	return Array.isArray(value);
}

function describeValue(value: LiteralValue): string {
	if (value instanceof Uint8Array) return `binary(${value.length})`;
	if (value instanceof Date) return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
	if (value instanceof Map) return `map(${value.size})`;
	if (isArray(value)) return `array(${value.length})`;
	return String(value);
}

function mismatch(value: LiteralValue, type: DataType): never {
	throw new TypeMismatchError(`Value ${describeValue(value)} cannot be represented as ${dataTypeSql(type)}`);
}
