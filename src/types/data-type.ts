import { MisuseError } from '../common/errors.js';
import { quoteIdentifier } from '../util/identifier.js';

/**
 * Concrete SQL data types. Each variant is tagged by `kind`; parameterized
 * variants carry their parameters.
 */
export type DataType =
	| { readonly kind: 'null' }
	| { readonly kind: 'boolean' }
	| { readonly kind: 'byte' }
	| { readonly kind: 'short' }
	| { readonly kind: 'integer' }
	| { readonly kind: 'long' }
	| { readonly kind: 'float' }
	| { readonly kind: 'double' }
	| DecimalType
	| { readonly kind: 'string' }
	| { readonly kind: 'binary' }
	| { readonly kind: 'date' }
	| { readonly kind: 'timestamp' }
	| ArrayType
	| MapType
	| StructType;

export interface DecimalType {
	readonly kind: 'decimal';
	readonly precision: number;
	readonly scale: number;
}

export interface ArrayType {
	readonly kind: 'array';
	readonly elementType: DataType;
}

export interface MapType {
	readonly kind: 'map';
	readonly keyType: DataType;
	readonly valueType: DataType;
}

export interface StructField {
	readonly name: string;
	readonly dataType: DataType;
}

export interface StructType {
	readonly kind: 'struct';
	readonly fields: readonly StructField[];
}

/** A disjunction of acceptable types, e.g. "INT or STRING" in a signature mismatch. */
export interface TypeCollection {
	readonly kind: 'collection';
	readonly types: readonly AbstractDataType[];
}

/** A family of types that is not itself concrete, such as "numeric" or "any". */
export interface AbstractType {
	readonly kind: 'abstract';
	readonly simpleString: string;
}

export type AbstractDataType = DataType | TypeCollection | AbstractType;

export const DataTypes = {
	NULL: { kind: 'null' },
	BOOLEAN: { kind: 'boolean' },
	BYTE: { kind: 'byte' },
	SHORT: { kind: 'short' },
	INTEGER: { kind: 'integer' },
	LONG: { kind: 'long' },
	FLOAT: { kind: 'float' },
	DOUBLE: { kind: 'double' },
	STRING: { kind: 'string' },
	BINARY: { kind: 'binary' },
	DATE: { kind: 'date' },
	TIMESTAMP: { kind: 'timestamp' },
} as const satisfies Record<string, DataType>;

export const NumericType: AbstractType = { kind: 'abstract', simpleString: 'numeric' };
export const AnyDataType: AbstractType = { kind: 'abstract', simpleString: 'any' };

export const MAX_DECIMAL_PRECISION = 38;

/** @throws MisuseError unless 1 <= precision <= 38 and 0 <= scale <= precision */
export function decimalType(precision: number = 10, scale: number = 0): DecimalType {
	if (!Number.isInteger(precision) || !Number.isInteger(scale)
		|| precision < 1 || precision > MAX_DECIMAL_PRECISION || scale < 0 || scale > precision) {
		throw new MisuseError(`Invalid decimal type DECIMAL(${precision},${scale})`);
	}
	return { kind: 'decimal', precision, scale };
}

export function arrayType(elementType: DataType): ArrayType {
	return { kind: 'array', elementType };
}

export function mapType(keyType: DataType, valueType: DataType): MapType {
	return { kind: 'map', keyType, valueType };
}

export function structType(fields: readonly StructField[]): StructType {
	return { kind: 'struct', fields };
}

export function typeCollection(...types: AbstractDataType[]): TypeCollection {
	return { kind: 'collection', types };
}

export function abstractType(simpleString: string): AbstractType {
	return { kind: 'abstract', simpleString };
}

export function isDataType(type: AbstractDataType): type is DataType {
	return type.kind !== 'collection' && type.kind !== 'abstract';
}

/**
 * Canonical SQL name of a concrete type, e.g. `INT`, `DECIMAL(10,0)`, `MAP<STRING, INT>`.
 */
export function dataTypeSql(type: DataType): string {
	switch (type.kind) {
		case 'null': return 'VOID';
		case 'boolean': return 'BOOLEAN';
		case 'byte': return 'TINYINT';
		case 'short': return 'SMALLINT';
		case 'integer': return 'INT';
		case 'long': return 'BIGINT';
		case 'float': return 'FLOAT';
		case 'double': return 'DOUBLE';
		case 'decimal': return `DECIMAL(${type.precision},${type.scale})`;
		case 'string': return 'STRING';
		case 'binary': return 'BINARY';
		case 'date': return 'DATE';
		case 'timestamp': return 'TIMESTAMP';
		case 'array': return `ARRAY<${dataTypeSql(type.elementType)}>`;
		case 'map': return `MAP<${dataTypeSql(type.keyType)}, ${dataTypeSql(type.valueType)}>`;
		case 'struct': {
			const fields = type.fields.map(f => `${quoteIdentifier(f.name)}: ${dataTypeSql(f.dataType)}`);
			return `STRUCT<${fields.join(', ')}>`;
		}
	}
}
