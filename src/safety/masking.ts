// src/safety/masking.ts — Violation sample masking
// At most 4 trailing characters of a sensitive span are ever revealed, and
// never more than the span minus 4 (short spans are fully masked).

export const MAX_REVEALED = 4

export function maskSample(span: string): string {
  const reveal = Math.min(MAX_REVEALED, Math.max(0, span.length - MAX_REVEALED))
  return "*".repeat(span.length - reveal) + span.slice(span.length - reveal)
}
