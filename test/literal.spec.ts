import { expect } from 'chai';
import { createLiteral, fractionalText, literalSql, quoteString } from '../src/types/literal.js';
import {
	DataTypes,
	NumericType,
	arrayType,
	dataTypeSql,
	decimalType,
	isDataType,
	mapType,
	structType,
	typeCollection,
} from '../src/types/data-type.js';
import { MisuseError, TypeMismatchError } from '../src/common/errors.js';
import { StatusCode } from '../src/common/types.js';

describe('Data Types', () => {
	it('should name primitive types', () => {
		expect(dataTypeSql(DataTypes.NULL)).to.equal('VOID');
		expect(dataTypeSql(DataTypes.BYTE)).to.equal('TINYINT');
		expect(dataTypeSql(DataTypes.SHORT)).to.equal('SMALLINT');
		expect(dataTypeSql(DataTypes.INTEGER)).to.equal('INT');
		expect(dataTypeSql(DataTypes.LONG)).to.equal('BIGINT');
		expect(dataTypeSql(DataTypes.TIMESTAMP)).to.equal('TIMESTAMP');
	});

	it('should name parameterized types', () => {
		expect(dataTypeSql(decimalType())).to.equal('DECIMAL(10,0)');
		expect(dataTypeSql(arrayType(decimalType(5, 2)))).to.equal('ARRAY<DECIMAL(5,2)>');
		expect(dataTypeSql(structType([
			{ name: 'id', dataType: DataTypes.LONG },
			{ name: 'tags', dataType: arrayType(DataTypes.STRING) },
		]))).to.equal('STRUCT<`id`: BIGINT, `tags`: ARRAY<STRING>>');
	});

	it('should distinguish concrete types from abstract ones', () => {
		expect(isDataType(DataTypes.STRING)).to.equal(true);
		expect(isDataType(NumericType)).to.equal(false);
		expect(isDataType(typeCollection(DataTypes.STRING))).to.equal(false);
	});

	it('should reject decimal types with an impossible precision or scale', () => {
		expect(() => decimalType(5, -1)).to.throw(MisuseError, 'Invalid decimal type DECIMAL(5,-1)');
		expect(() => decimalType(5, 6)).to.throw(MisuseError);
		expect(() => decimalType(0, 0)).to.throw(MisuseError);
		expect(() => decimalType(39, 0)).to.throw(MisuseError);
		expect(() => decimalType(10.5, 2)).to.throw(MisuseError);
		expect(dataTypeSql(decimalType(38, 38))).to.equal('DECIMAL(38,38)');
	});
});

describe('Literals', () => {

	describe('fractionalText', () => {
		it('should always carry a fractional part', () => {
			expect(fractionalText(100)).to.equal('100.0');
			expect(fractionalText(0.1)).to.equal('0.1');
			expect(fractionalText(-0)).to.equal('-0.0');
		});

		it('should keep exponents and special values as they are', () => {
			expect(fractionalText(1e21)).to.equal('1e+21');
			expect(fractionalText(NaN)).to.equal('NaN');
			expect(fractionalText(-Infinity)).to.equal('-Infinity');
		});
	});

	describe('quoteString', () => {
		it('should escape quotes and backslashes', () => {
			expect(quoteString("O'Neil")).to.equal("'O\\'Neil'");
			expect(quoteString('a\\b')).to.equal("'a\\\\b'");
		});
	});

	describe('literalSql', () => {
		it('should mark integral widths with suffixes', () => {
			expect(literalSql(createLiteral(42, DataTypes.INTEGER))).to.equal('42');
			expect(literalSql(createLiteral(-1, DataTypes.BYTE))).to.equal('-1Y');
			expect(literalSql(createLiteral(9223372036854775807n, DataTypes.LONG))).to.equal('9223372036854775807L');
		});

		it('should cast FLOAT values', () => {
			expect(literalSql(createLiteral(1.5, DataTypes.FLOAT))).to.equal('CAST(1.5 AS FLOAT)');
			expect(literalSql(createLiteral(NaN, DataTypes.FLOAT))).to.equal("CAST('NaN' AS FLOAT)");
		});

		it('should suffix finite DOUBLE values and cast the rest', () => {
			expect(literalSql(createLiteral(0.25, DataTypes.DOUBLE))).to.equal('0.25D');
			expect(literalSql(createLiteral(-Infinity, DataTypes.DOUBLE))).to.equal("CAST('-Infinity' AS DOUBLE)");
		});

		it('should scale decimals', () => {
			expect(literalSql(createLiteral(3n, decimalType(5, 2)))).to.equal('3.00BD');
			expect(literalSql(createLiteral(12.345, decimalType(10, 3)))).to.equal('12.345BD');
			expect(literalSql(createLiteral('-7', decimalType(3, 0)))).to.equal('-7BD');
		});

		it('should not write a sign on decimal zero', () => {
			expect(literalSql(createLiteral(-0.4, decimalType(5, 0)))).to.equal('0BD');
			expect(literalSql(createLiteral(-0.001, decimalType(5, 2)))).to.equal('0.00BD');
			expect(literalSql(createLiteral('-0.0', decimalType(5, 2)))).to.equal('0.00BD');
		});

		it('should write booleans, binaries and dates', () => {
			expect(literalSql(createLiteral(false, DataTypes.BOOLEAN))).to.equal('FALSE');
			expect(literalSql(createLiteral(new Uint8Array([0xde, 0xad, 0x01]), DataTypes.BINARY))).to.equal("X'DEAD01'");
			expect(literalSql(createLiteral(new Date(Date.UTC(2024, 2, 1)), DataTypes.DATE))).to.equal("DATE '2024-03-01'");
		});

		it('should write dates at both ends of the four-digit year range', () => {
			expect(literalSql(createLiteral(new Date('0001-01-01T00:00:00Z'), DataTypes.DATE))).to.equal("DATE '0001-01-01'");
			expect(literalSql(createLiteral(new Date('9999-12-31T23:59:59Z'), DataTypes.TIMESTAMP)))
				.to.equal("TIMESTAMP '9999-12-31 23:59:59'");
		});

		it('should drop zero milliseconds from timestamps', () => {
			expect(literalSql(createLiteral(new Date(Date.UTC(2024, 0, 2, 3, 4, 5)), DataTypes.TIMESTAMP)))
				.to.equal("TIMESTAMP '2024-01-02 03:04:05'");
			expect(literalSql(createLiteral(new Date(Date.UTC(2024, 0, 2, 3, 4, 5, 678)), DataTypes.TIMESTAMP)))
				.to.equal("TIMESTAMP '2024-01-02 03:04:05.678'");
		});

		it('should write collections', () => {
			expect(literalSql(createLiteral([1, 2], arrayType(DataTypes.INTEGER)))).to.equal('ARRAY(1, 2)');
			expect(literalSql(createLiteral(['a', null], arrayType(DataTypes.STRING)))).to.equal("ARRAY('a', NULL)");
			expect(literalSql(createLiteral(new Map([['k', 1]]), mapType(DataTypes.STRING, DataTypes.LONG))))
				.to.equal("MAP('k', 1L)");
		});

		it('should write structs as named structs', () => {
			const type = structType([
				{ name: 'id', dataType: DataTypes.INTEGER },
				{ name: 'name', dataType: DataTypes.STRING },
			]);
			expect(literalSql(createLiteral([1, 'x'], type))).to.equal("NAMED_STRUCT('id', 1, 'name', 'x')");
		});

		it('should write NULL for a null value of any type', () => {
			expect(literalSql(createLiteral(null, arrayType(DataTypes.INTEGER)))).to.equal('NULL');
		});
	});

	describe('createLiteral', () => {
		it('should reject integers outside the type range', () => {
			expect(() => createLiteral(128, DataTypes.BYTE)).to.throw(TypeMismatchError);
			expect(() => createLiteral(2 ** 31, DataTypes.INTEGER)).to.throw(TypeMismatchError);
			expect(() => createLiteral(2 ** 53, DataTypes.LONG)).to.throw(TypeMismatchError);
		});

		it('should reject fractional values for integral types', () => {
			expect(() => createLiteral(1.5, DataTypes.INTEGER)).to.throw(TypeMismatchError);
		});

		it('should reject decimals that do not fit', () => {
			expect(() => createLiteral('123456', decimalType(5, 2))).to.throw(TypeMismatchError);
			expect(() => createLiteral('1.234', decimalType(5, 2))).to.throw(TypeMismatchError);
			expect(() => createLiteral('1e3', decimalType(5, 2))).to.throw(TypeMismatchError);
		});

		it('should reject numbers too large for plain decimal text', () => {
			expect(() => createLiteral(1e21, decimalType(10, 0))).to.throw(TypeMismatchError);
			expect(() => createLiteral(-1e25, decimalType(38, 0))).to.throw(TypeMismatchError);
		});

		it('should reject dates outside years 1 to 9999', () => {
			expect(() => createLiteral(new Date(Date.UTC(10000, 0, 15)), DataTypes.DATE)).to.throw(TypeMismatchError);
			expect(() => createLiteral(new Date('0000-06-01T00:00:00Z'), DataTypes.DATE)).to.throw(TypeMismatchError);
			expect(() => createLiteral(new Date(Date.UTC(10000, 0, 15)), DataTypes.TIMESTAMP)).to.throw(TypeMismatchError);
		});

		it('should reject non-null values for the null type', () => {
			expect(() => createLiteral(1, DataTypes.NULL)).to.throw(TypeMismatchError);
		});

		it('should check collection members', () => {
			expect(() => createLiteral([1, 'x'], arrayType(DataTypes.INTEGER))).to.throw(TypeMismatchError);
			expect(() => createLiteral([1], structType([
				{ name: 'a', dataType: DataTypes.INTEGER },
				{ name: 'b', dataType: DataTypes.INTEGER },
			]))).to.throw(TypeMismatchError);
		});

		it('should describe the rejected value and carry the mismatch status', () => {
			expect(() => createLiteral(new Date(NaN), DataTypes.DATE))
				.to.throw(TypeMismatchError, 'Value Invalid Date cannot be represented as DATE')
				.with.property('code', StatusCode.MISMATCH);
		});
	});
});
