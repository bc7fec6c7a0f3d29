/**
 * Per-chunk logs only fire for the first five events and every tenth after
 */
export function shouldLogCount(count: number): boolean {
  return count <= 5 || count % 10 === 0;
}
