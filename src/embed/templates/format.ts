export function fmtCount(n: number): string {
  return n.toLocaleString('en-US');
}

const BYTE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'];

export function fmtBytes(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < BYTE_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  const digits = unit === 0 || value >= 10 ? 0 : 1;
  return `${value.toFixed(digits)} ${BYTE_UNITS[unit]}`;
}

export function fmtPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}

export function fmtUptime(seconds: number): string {
  const days = Math.floor(seconds / 86400);
  if (days >= 1) return `${days} day${days === 1 ? '' : 's'}`;
  const hours = Math.floor(seconds / 3600);
  if (hours >= 1) return `${hours} hour${hours === 1 ? '' : 's'}`;
  const minutes = Math.floor(seconds / 60);
  return `${minutes} minute${minutes === 1 ? '' : 's'}`;
}

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

/** `2026-09-28` → `Sep 28, 2026`, without going through the local timezone. */
export function fmtDate(isoDate: string): string {
  const [y, m, d] = isoDate.split('-').map((p) => parseInt(p, 10));
  if (!y || !m || !d || m < 1 || m > 12) return isoDate;
  return `${MONTHS[m - 1]} ${d}, ${y}`;
}

/** `2026-09-28` → `Sep 28`, for chart axes. */
export function fmtShortDate(isoDate: string): string {
  const full = fmtDate(isoDate);
  return full === isoDate ? isoDate : full.replace(/, \d+$/, '');
}
