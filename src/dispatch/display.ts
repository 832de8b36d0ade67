/**
 * Display collaborator.
 *
 * The host editor renders results; the pipeline only tells it what to show.
 * `MemoryDisplay` keeps that state in memory for hosts that poll.
 */
import { formatDiagnostic, type Diagnostic } from '../errors.js';

export interface Display {
  /** Replace every shown line. */
  setLines(lines: readonly string[]): void;
  appendLines(lines: readonly string[]): void;
  setIndicator(text: string): void;
  showNoResults(): void;
  showError(diagnostic: Diagnostic): void;
  clear(): void;
}

export type DisplayStatus = 'results' | 'empty' | 'no-results' | 'error';

export interface DisplaySnapshot {
  status: DisplayStatus;
  lines: string[];
  indicator: string;
  error?: Diagnostic;
  /** Bumped on every change; lets pollers skip unchanged state. */
  revision: number;
}

export class MemoryDisplay implements Display {
  private lines: string[] = [];
  private indicator = '';
  private status: DisplayStatus = 'empty';
  private error?: Diagnostic;
  private revision = 0;

  setLines(lines: readonly string[]): void {
    this.lines = [...lines];
    this.status = this.lines.length > 0 ? 'results' : 'empty';
    this.error = undefined;
    this.revision++;
  }

  appendLines(lines: readonly string[]): void {
    if (lines.length === 0) return;
    this.lines.push(...lines);
    this.status = 'results';
    this.revision++;
  }

  setIndicator(text: string): void {
    this.indicator = text;
    this.revision++;
  }

  showNoResults(): void {
    this.lines = [];
    this.status = 'no-results';
    this.error = undefined;
    this.revision++;
  }

  showError(diagnostic: Diagnostic): void {
    this.lines = formatDiagnostic(diagnostic);
    this.status = 'error';
    this.error = diagnostic;
    this.revision++;
  }

  clear(): void {
    this.lines = [];
    this.indicator = '';
    this.status = 'empty';
    this.error = undefined;
    this.revision++;
  }

  /** Cursor and selection make sense only over real results. */
  get selectable(): boolean {
    return this.status === 'results';
  }

  snapshot(offset = 0, limit?: number): DisplaySnapshot {
    const end = limit === undefined ? undefined : offset + limit;
    return {
      status: this.status,
      lines: this.lines.slice(offset, end),
      indicator: this.indicator,
      error: this.error,
      revision: this.revision,
    };
  }

  get lineCount(): number {
    return this.lines.length;
  }
}
