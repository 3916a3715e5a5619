/**
 * Debug tracing, enabled with CSV2JSON_DEBUG=1
 */

export function isDebugEnabled(): boolean {
  const flag = process.env.CSV2JSON_DEBUG;
  return flag === "1" || flag === "true";
}

/**
 * Write a tagged debug line to stderr when tracing is enabled.
 * Pass a function to skip building the message otherwise.
 */
export function debug(scope: string, message: string | (() => string)): void {
  if (!isDebugEnabled()) return;
  console.error(`[${scope}] ${typeof message === "function" ? message() : message}`);
}
