const SECOND_FACTOR_CODE = /^[0-9]{6}$/;

/**
 * Accounts are case-insensitive; the authority only ever sees the trimmed, lower-cased form.
 */
export const normalizeUsername = (username: string): string => username.trim().toLowerCase();

export const isSecondFactorCode = (code: string): boolean => SECOND_FACTOR_CODE.test(code);
