export function escapeXml(text: string): string {
  return String(text)
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

// Text width approximation for non-browser environments
// Assumes ~0.6em per character (reasonable for Inter/Arial at 10–16px)
export function measureText(text: string, fontSize = 12): number {
  const avg = 0.6 * fontSize;
  return Math.max(0, Math.round(text.length * avg));
}

export function formatNumber(n: number): string {
  // Keep simple, avoid locales so output is byte-stable
  if (Number.isInteger(n)) return String(n);
  const r = Math.round(n * 100) / 100;
  return Object.is(r, -0) ? '0' : r.toString();
}

/** 32-bit FNV-1a over the UTF-16 code units of `text`, as 8 lowercase hex digits. */
export function fnv1a(text: string): string {
  let hash = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return (hash >>> 0).toString(16).padStart(8, '0');
}
