/**
 * Waits for the given number of milliseconds.
 *
 * @example
 * await sleep(1_000);
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
