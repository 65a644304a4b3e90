// Auto-lock configuration (milliseconds).

export const DEFAULT_AUTO_LOCK_MS = 5 * 60 * 1000;
