/**
 * Line diff and secret masking for overwrite previews.
 */

export const MASK = '********';

function toLines(text: string): string[] {
  const lines = text.split('\n');
  // A final newline terminates the last line, it does not start a new one
  if (lines.length > 1 && lines[lines.length - 1] === '') lines.pop();
  return lines;
}

/**
 * Minimal line diff between `before` and `after`: removed lines are prefixed
 * with `-`, added lines with `+`, unchanged lines are omitted.
 * A null `before` (no destination yet) lists every line as added.
 */
export function lineDiff(before: string | null, after: string): string {
  const b = toLines(after);
  if (before === null) return b.map((line) => `+${line}`).join('\n');
  const a = toLines(before);

  // Longest common subsequence table; templates are config-file sized
  const n = a.length;
  const m = b.length;
  const lcs: number[][] = Array.from({ length: n + 1 }, () =>
    new Array<number>(m + 1).fill(0),
  );
  for (let i = n - 1; i >= 0; i--) {
    for (let j = m - 1; j >= 0; j--) {
      lcs[i][j] =
        a[i] === b[j]
          ? lcs[i + 1][j + 1] + 1
          : Math.max(lcs[i + 1][j], lcs[i][j + 1]);
    }
  }

  const out: string[] = [];
  let i = 0;
  let j = 0;
  while (i < n && j < m) {
    if (a[i] === b[j]) {
      i++;
      j++;
    } else if (lcs[i + 1][j] >= lcs[i][j + 1]) {
      out.push(`-${a[i++]}`);
    } else {
      out.push(`+${b[j++]}`);
    }
  }
  while (i < n) out.push(`-${a[i++]}`);
  while (j < m) out.push(`+${b[j++]}`);
  return out.join('\n');
}

/**
 * Replace every occurrence of each secret value in `text` with a mask.
 * Longer values are masked first so a secret that contains another is
 * hidden whole.
 */
export function maskSecrets(text: string, secrets: Iterable<string>): string {
  const ordered = [...new Set(secrets)]
    .filter((s) => s.length > 0)
    .sort((x, y) => y.length - x.length);
  let masked = text;
  for (const secret of ordered) {
    masked = masked.split(secret).join(MASK);
  }
  return masked;
}
