import { EventEmitter } from 'node:events';

import type { Diagnostic } from '../types.js';

export type SeverityLabel = 'error' | 'warning' | 'info' | 'hint';

export type DiagnosticsListener = (
  uri: string,
  diagnostics: readonly Diagnostic[],
) => void;

const CHANGE_EVENT = 'change';

/**
 * Latest diagnostics published per document uri. Each publish replaces the
 * previous list for that uri.
 */
export class DiagnosticsCache {
  private readonly byUri = new Map<string, Diagnostic[]>();
  private readonly events = new EventEmitter();

  constructor() {
    this.events.setMaxListeners(0);
  }

  set(uri: string, diagnostics: readonly Diagnostic[]): void {
    const copy = [...diagnostics];
    this.byUri.set(uri, copy);
    this.events.emit(CHANGE_EVENT, uri, copy);
  }

  get(uri: string): Diagnostic[] {
    return [...(this.byUri.get(uri) ?? [])];
  }

  has(uri: string): boolean {
    return this.byUri.has(uri);
  }

  delete(uri: string): boolean {
    const removed = this.byUri.delete(uri);
    if (removed) {
      this.events.emit(CHANGE_EVENT, uri, []);
    }
    return removed;
  }

  snapshot(): Map<string, Diagnostic[]> {
    return new Map(
      [...this.byUri.entries()].map(([uri, list]) => [uri, [...list]]),
    );
  }

  /** Returns a function that removes the listener. */
  onChange(listener: DiagnosticsListener): () => void {
    this.events.on(CHANGE_EVENT, listener);
    return () => {
      this.events.off(CHANGE_EVENT, listener);
    };
  }
}

export function severityLabel(severity: number | undefined): SeverityLabel {
  switch (severity) {
    case 2:
      return 'warning';
    case 3:
      return 'info';
    case 4:
      return 'hint';
    default:
      return 'error';
  }
}

/** `ERROR [3:5] message (code)`, with 1-based line and column. */
export function formatDiagnosticLine(diagnostic: Diagnostic): string {
  const severity = severityLabel(diagnostic.severity).toUpperCase();
  const { line, character } = diagnostic.range.start;
  const codeSuffix =
    diagnostic.code === undefined ? '' : ` (${diagnostic.code})`;

  return `${severity} [${line + 1}:${character + 1}] ${diagnostic.message}${codeSuffix}`;
}

export function sortDiagnostics(
  diagnostics: readonly Diagnostic[],
): Diagnostic[] {
  return [...diagnostics].sort((a, b) => {
    if (a.range.start.line !== b.range.start.line) {
      return a.range.start.line - b.range.start.line;
    }
    return a.range.start.character - b.range.start.character;
  });
}

/**
 * One block per file: a header, up to `limit` lines in position order, and
 * an overflow note when some were left out.
 */
export function formatFileDiagnostics(
  file: string,
  diagnostics: readonly Diagnostic[],
  limit = 20,
): string {
  const included = sortDiagnostics(diagnostics)
    .slice(0, limit)
    .map((diagnostic) => `  ${formatDiagnosticLine(diagnostic)}`);
  const overflow = diagnostics.length - included.length;
  const lines = [`${file}: ${summarizeDiagnostics(diagnostics)}`, ...included];
  if (overflow > 0) {
    lines.push(`  ... and ${overflow} more`);
  }
  return lines.join('\n');
}

const plural = (count: number, noun: string): string =>
  `${count} ${noun}${count === 1 ? '' : 's'}`;

/** Status-line summary such as `2 errors, 1 warning`. */
export function summarizeDiagnostics(
  diagnostics: readonly Diagnostic[],
): string {
  const counts: Record<SeverityLabel, number> = {
    error: 0,
    warning: 0,
    info: 0,
    hint: 0,
  };
  for (const diagnostic of diagnostics) {
    counts[severityLabel(diagnostic.severity)] += 1;
  }

  const parts = [
    counts.error > 0 ? plural(counts.error, 'error') : '',
    counts.warning > 0 ? plural(counts.warning, 'warning') : '',
    counts.info > 0 ? `${counts.info} info` : '',
    counts.hint > 0 ? plural(counts.hint, 'hint') : '',
  ].filter((part) => part.length > 0);

  return parts.length === 0 ? 'no problems' : parts.join(', ');
}
