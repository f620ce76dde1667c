import debug from 'debug';

const BASE_NAMESPACE = 'query-errors';

/**
 * Logger for one part of the package, under the `query-errors:` namespace.
 *
 * ```typescript
 * const log = createLogger('identifier');      // query-errors:identifier
 * const errorLog = log.extend('error');        // query-errors:identifier:error
 * errorLog('Rejected identifier path %s', text);
 * ```
 *
 * Output is off until the namespace is switched on through DEBUG or `enableLogging`.
 */
export function createLogger(subNamespace: string): debug.Debugger {
	return debug(`${BASE_NAMESPACE}:${subNamespace}`);
}

/**
 * Switches on the namespaces matching `pattern` (debug's comma-separated syntax,
 * `-` to exclude), replacing whatever DEBUG selected.
 * `logFn` replaces debug's stderr writer for every logger.
 */
export function enableLogging(
	pattern: string = `${BASE_NAMESPACE}:*`,
	logFn?: (...args: unknown[]) => void
): void {
	if (logFn) {
		debug.log = logFn;
	}
	debug.enable(pattern);
}

export function disableLogging(): void {
	debug.disable();
}

/** @param namespace - name below `query-errors:`, e.g. 'format' */
export function isLoggingEnabled(namespace: string): boolean {
	return debug.enabled(`${BASE_NAMESPACE}:${namespace}`);
}
