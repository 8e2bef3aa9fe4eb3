// apps/engine/src/features/rolling.ts
//
// Causal window primitives over one owner's channel column.
// `end` is a 0-based index; every function reads indices <= end only.
// A window that is not fully available, or that contains a missing value,
// yields null.
//
// Means are taken relative to the window's first value so a constant run
// gives back that constant exactly (and a standard deviation of exactly 0).

export type Column = ReadonlyArray<number | null>;

function windowValues(col: Column, end: number, w: number): number[] | null {
  const start = end - w + 1;
  if (start < 0 || end >= col.length) return null;
  const out: number[] = [];
  for (let i = start; i <= end; i++) {
    const v = col[i];
    if (v === null) return null;
    out.push(v);
  }
  return out;
}

function shiftedMean(xs: number[]): number {
  const x0 = xs[0];
  let acc = 0;
  for (const x of xs) acc += x - x0;
  return x0 + acc / xs.length;
}

export function rollingMeanAt(col: Column, end: number, w: number): number | null {
  const xs = windowValues(col, end, w);
  return xs ? shiftedMean(xs) : null;
}

/** Sample standard deviation (n - 1 denominator). */
export function rollingStdAt(col: Column, end: number, w: number): number | null {
  if (w < 2) return null;
  const xs = windowValues(col, end, w);
  if (!xs) return null;
  const m = shiftedMean(xs);
  let ss = 0;
  for (const x of xs) ss += (x - m) * (x - m);
  return Math.sqrt(ss / (xs.length - 1));
}

export function lagAt(col: Column, end: number, k: number): number | null {
  const i = end - k;
  if (i < 0 || end >= col.length) return null;
  return col[i];
}

/** Current value minus the w-sample mean ending one sample earlier. */
export function deltaAt(col: Column, end: number, w: number): number | null {
  if (end < 0 || end >= col.length) return null;
  const cur = col[end];
  if (cur === null) return null;
  const base = rollingMeanAt(col, end - 1, w);
  return base === null ? null : cur - base;
}

/**
 * Edge fill: a gap after the first defined value takes the last defined value
 * before it; leading gaps take the first defined value. A column with no
 * defined value stays empty.
 */
export function fillDownUp(col: Column): { values: (number | null)[]; filled: boolean[] } {
  const values = [...col];
  const filled = values.map(() => false);

  let last: number | null = null;
  for (let i = 0; i < values.length; i++) {
    const v = values[i];
    if (v !== null) {
      last = v;
    } else if (last !== null) {
      values[i] = last;
      filled[i] = true;
    }
  }

  const first = values.findIndex((v) => v !== null);
  if (first > 0) {
    for (let i = 0; i < first; i++) {
      values[i] = values[first];
      filled[i] = true;
    }
  }

  return { values, filled };
}
