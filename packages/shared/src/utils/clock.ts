export function isoNow(): string {
  return new Date().toISOString();
}

/** Current time in whole seconds since the epoch, as used by token claims. */
export function epochSeconds(): number {
  return Math.floor(Date.now() / 1000);
}
