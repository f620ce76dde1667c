/**
 * query-errors - canonical fragments for SQL engine error messages.
 *
 * Formats values, types, identifiers, statements, configuration keys and
 * expressions with one fixed set of quoting rules, so messages read alike
 * across the engine.
 */

// Message fragments
export {
	AUTO_GENERATED_SUBQUERY_NAME,
	toSqlValue,
	toSqlType,
	toSqlId,
	toSqlStmt,
	toSqlConf,
	toSqlConfVal,
	toDsOption,
	toSqlSchema,
	toSqlExpr,
	getSummary,
	getQueryContext,
} from './common/message-format.js';

// Query context
export { SqlQueryContext } from './common/query-context.js';
export type { QueryContext, SqlQueryContextOptions } from './common/query-context.js';

// Data types and literals
export {
	DataTypes,
	NumericType,
	AnyDataType,
	decimalType,
	MAX_DECIMAL_PRECISION,
	arrayType,
	mapType,
	structType,
	typeCollection,
	abstractType,
	isDataType,
	dataTypeSql,
} from './types/data-type.js';
export type {
	DataType,
	DecimalType,
	ArrayType,
	MapType,
	StructType,
	StructField,
	TypeCollection,
	AbstractType,
	AbstractDataType,
} from './types/data-type.js';
export { createLiteral, literalSql, fractionalText, quoteString } from './types/literal.js';
export type { Literal, LiteralValue } from './types/literal.js';

// Expressions
export { col, lit, binary, neg, not, isNull, isNotNull, fn, cast, alias } from './expr/ast.js';
export type * as AST from './expr/ast.js';
export { expressionSql, toPrettySql } from './expr/pretty.js';

// Identifiers
export { quoteIdentifier, parseIdentifierPath } from './util/identifier.js';

// Errors, status codes and logging
export { StatusCode } from './common/types.js';
export { QueryError, MisuseError, TypeMismatchError, IdentifierSyntaxError } from './common/errors.js';
export { createLogger, enableLogging, disableLogging, isLoggingEnabled } from './common/logger.js';
