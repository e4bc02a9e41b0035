import { ImportJobResult, Verdict } from '../types.js';

let quietMode = false;

export function setOutputConfig(config: { quiet: boolean }): void {
  quietMode = config.quiet;
}

export function resetOutputConfig(): void {
  setOutputConfig({ quiet: false });
}

/** Progress notes go to stderr; stdout is reserved for results. */
export function logProgress(message: string): void {
  if (quietMode) {
    return;
  }

  process.stderr.write(withNewline(message));
}

export function logError(message: string): void {
  process.stderr.write(withNewline(message));
}

export function writeResult(text: string): void {
  process.stdout.write(withNewline(text));
}

export function writeHostResult(host: string, verdict: Verdict | null): void {
  logProgress(renderHostResult(host, verdict));
}

export function renderHostResult(host: string, verdict: Verdict | null): string {
  return verdict ? `❌ ${host} (Error: ${verdict})` : `✅ ${host}`;
}

export function renderImportSummary(results: ImportJobResult[]): string {
  const lines: string[] = [];
  let totalErrors = 0;

  for (const result of results) {
    totalErrors += result.errorCount;
    if (result.errorCount === 0) {
      lines.push(`Import job ${result.jobId}: ok`);
      continue;
    }

    lines.push(`Import job ${result.jobId}: ${result.errorCount} error(s)`);
    for (const error of result.errors) {
      lines.push(`  - ${error}`);
    }
  }

  lines.push(`Imported in ${results.length} job(s), ${totalErrors} error(s) total.`);
  return lines.join('\n');
}

function withNewline(text: string): string {
  return text.endsWith('\n') ? text : `${text}\n`;
}
