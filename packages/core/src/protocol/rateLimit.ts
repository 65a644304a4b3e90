export const DEFAULT_RETRY_AFTER_SECONDS = 60;

const SECONDS_IN_TEXT = /(\d+)\s*(?:seconds?|secs?|s)\b/i;
const MINUTES_IN_TEXT = /(\d+)\s*(?:minutes?|mins?)\b/i;

const positive = (value: number): number | null => (Number.isFinite(value) && value > 0 ? Math.ceil(value) : null);

const fromHeader = (header: string, now: number): number | null => {
  const trimmed = header.trim();
  if (/^\d+$/.test(trimmed)) {
    return positive(Number(trimmed));
  }
  const at = Date.parse(trimmed);
  return Number.isNaN(at) ? null : positive((at - now) / 1000);
};

const fromDetail = (detail: string): number | null => {
  const seconds = SECONDS_IN_TEXT.exec(detail);
  if (seconds?.[1]) return positive(Number(seconds[1]));
  const minutes = MINUTES_IN_TEXT.exec(detail);
  if (minutes?.[1]) return positive(Number(minutes[1]) * 60);
  return null;
};

/**
 * Seconds to wait before retrying: the Retry-After header (delta or HTTP date),
 * then a figure in the server's message, then {@link DEFAULT_RETRY_AFTER_SECONDS}.
 */
export const resolveRetryAfter = (header: string | null, detail: string | null, now: number): number =>
  (header ? fromHeader(header, now) : null) ?? (detail ? fromDetail(detail) : null) ?? DEFAULT_RETRY_AFTER_SECONDS;
