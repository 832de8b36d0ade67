/**
 * Match-count indicator text.
 */

export function formatIndicator(displayed: number, total?: number): string {
  if (total === undefined || total === displayed) return String(displayed);
  return `${displayed}/${total}`;
}
