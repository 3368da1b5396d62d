// ─── Display helpers ───────────────────────────────────────────────────────

export function formatNumber(n: number): string {
  if (n >= 1_000_000) return `${(n / 1_000_000).toFixed(2)}M`;
  if (n >= 1_000) return `${(n / 1_000).toFixed(2)}K`;
  return n.toFixed(2);
}

export function bar(value: number, max: number, width = 20): string {
  const filled = Math.min(width, Math.max(0, Math.round((value / max) * width)));
  return '[' + '█'.repeat(filled) + '░'.repeat(width - filled) + ']';
}

export function formatCooldown(ms: number): string {
  return ms === 0 ? 'no cooldown' : `${ms / 1000}s cooldown`;
}
