/**
 * Status codes carried by errors from this package, numbered after SQLite's result codes.
 */
export enum StatusCode {
	ERROR = 1,
	MISMATCH = 20,
	MISUSE = 21,
	SYNTAX = 29,
}
