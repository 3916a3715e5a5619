/** Summary line printed after a run */
export function formatSummary(
  rowCount: number,
  errorCount: number,
  startTime: number,
  fileSize?: number
): string {
  const elapsed = (performance.now() - startTime) / 1000;
  const throughput = fileSize && elapsed > 0 ? (fileSize / 1024 / 1024 / elapsed).toFixed(1) : null;

  let message = `✓ Processed ${rowCount.toLocaleString()} rows in ${elapsed.toFixed(2)}s`;
  if (throughput) {
    message += ` (${throughput} MB/s)`;
  }
  if (errorCount > 0) {
    message += `, ${errorCount.toLocaleString()} skipped`;
  }

  return message;
}
