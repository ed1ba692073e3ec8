/**
 * Result of a call across an external tool boundary.
 * Tools report failure as a value; only the run controller turns it into an error.
 */
export type Outcome = { ok: true } | { ok: false; reason: string };

export const succeeded = (): Outcome => ({ ok: true });

export const failed = (reason: string): Outcome => ({ ok: false, reason });
