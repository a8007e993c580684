/** `count` evenly spaced points from start to stop inclusive. */
export function linspace(start: number, stop: number, count: number): number[] {
  if (!Number.isInteger(count) || count < 1) {
    throw new RangeError(`linspace count must be a positive integer, got ${count}`);
  }
  if (count === 1) return [start];
  const step = (stop - start) / (count - 1);
  const out: number[] = [];
  for (let i = 0; i < count - 1; i++) out.push(start + i * step);
  out.push(stop);
  return out;
}

/** Row-major evaluation of f over rows × cols, flattened into a single batch. */
export function evaluateGrid<R, C, V>(rows: readonly R[], cols: readonly C[], f: (row: R, col: C) => V): V[][] {
  const cells = rows.flatMap((row, i) => cols.map((col, j) => ({ row, col, i, j })));
  const values = cells.map(({ row, col }) => f(row, col));
  return rows.map((_, i) => values.slice(i * cols.length, (i + 1) * cols.length));
}
