import { StatusCode } from './types.js';

/**
 * Base class for errors raised by this package.
 * `line` and `column` are 1-based; when both are given they are appended to the message.
 */
export class QueryError extends Error {
	public code: number;
	public cause?: Error;
	public line?: number;
	public column?: number;

	constructor(message: string, code: number = StatusCode.ERROR, cause?: Error, line?: number, column?: number) {
		const located = line !== undefined && column !== undefined;
		super(located ? `${message} (at line ${line}, column ${column})` : message);
		this.name = 'QueryError';
		this.code = code;
		this.cause = cause;
		this.line = line;
		this.column = column;
		Error.captureStackTrace(this, new.target);
	}
}

/** Raised when a caller passes arguments the API does not accept */
export class MisuseError extends QueryError {
	constructor(message: string = "API misuse") {
		super(message, StatusCode.MISUSE);
		this.name = 'MisuseError';
		Object.setPrototypeOf(this, MisuseError.prototype);
	}
}

/** Raised when a value cannot be represented by the data type it is paired with */
export class TypeMismatchError extends QueryError {
	constructor(message: string) {
		super(message, StatusCode.MISMATCH);
		this.name = 'TypeMismatchError';
		Object.setPrototypeOf(this, TypeMismatchError.prototype);
	}
}

/**
 * Raised for a malformed dotted identifier path.
 * `position` is the zero-based offset of the offending character.
 */
export class IdentifierSyntaxError extends QueryError {
	public readonly input: string;
	public readonly position: number;

	constructor(input: string, position: number) {
		super(`Syntax error in identifier path '${input}'`, StatusCode.SYNTAX, undefined, 1, position + 1);
		this.input = input;
		this.position = position;
		this.name = 'IdentifierSyntaxError';
		Object.setPrototypeOf(this, IdentifierSyntaxError.prototype);
	}
}
