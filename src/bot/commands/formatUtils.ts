export function formatDuration(ms: number): string {
  const totalSeconds = Math.max(0, Math.floor(ms / 1000));
  const days = Math.floor(totalSeconds / 86400);
  const hours = Math.floor((totalSeconds % 86400) / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  if (days > 0) return `${days}d ${hours}h ${minutes}m`;
  if (hours > 0) return `${hours}h ${minutes}m ${seconds}s`;
  if (minutes > 0) return `${minutes}m ${seconds}s`;
  return `${seconds}s`;
}

export function formatPercent(ratio: number): string {
  if (!Number.isFinite(ratio)) return '0.0%';
  return `${(Math.max(0, ratio) * 100).toFixed(1)}%`;
}

// YYYY-MM-DD in local time.
export function formatDate(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

export function pluralize(count: number, singular: string, plural = `${singular}s`): string {
  return `${count} ${count === 1 ? singular : plural}`;
}

/**
 * Packs lines greedily into newline-joined chunks no longer than maxLength.
 * A line that is longer than maxLength on its own gets a chunk to itself.
 */
export function chunkLines(lines: readonly string[], maxLength: number): string[] {
  const chunks: string[] = [];
  let current: string[] = [];
  let currentLength = 0;

  for (const line of lines) {
    const added = current.length ? currentLength + 1 + line.length : line.length;
    if (current.length && added > maxLength) {
      chunks.push(current.join('\n'));
      current = [];
      currentLength = 0;
    }
    current.push(line);
    currentLength = current.length === 1 ? line.length : currentLength + 1 + line.length;
  }
  if (current.length) {
    chunks.push(current.join('\n'));
  }
  return chunks;
}
