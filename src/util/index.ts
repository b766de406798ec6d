export type Ordering = -1 | 0 | 1;

export function compareNumbers(a: number, b: number): Ordering {
  if (a < b) {
    return -1;
  }
  if (a > b) {
    return 1;
  }
  return 0;
}
