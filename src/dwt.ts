// One-level orthonormal 2D Haar transform. Inputs must have even dimensions.
// For a 2x2 block  a b
//                  c d
// LL = (a+b+c+d)/2, HL = (a-b+c-d)/2, LH = (a+b-c-d)/2, HH = (a-b-c+d)/2

export type Matrix = number[][];

export function haarDWT(mat: Matrix): [Matrix, Matrix, Matrix, Matrix] {
  const h = mat.length >> 1;
  const w = (mat[0]?.length ?? 0) >> 1;
  const LL: Matrix = [], HL: Matrix = [], LH: Matrix = [], HH: Matrix = [];
  for (let i = 0; i < h; i++) {
    const top = mat[2 * i]!, bottom = mat[2 * i + 1]!;
    const ll: number[] = [], hl: number[] = [], lh: number[] = [], hh: number[] = [];
    for (let j = 0; j < w; j++) {
      const a = top[2 * j]!, b = top[2 * j + 1]!;
      const c = bottom[2 * j]!, d = bottom[2 * j + 1]!;
      ll.push((a + b + c + d) / 2);
      hl.push((a - b + c - d) / 2);
      lh.push((a + b - c - d) / 2);
      hh.push((a - b - c + d) / 2);
    }
    LL.push(ll); HL.push(hl); LH.push(lh); HH.push(hh);
  }
  return [LL, HL, LH, HH];
}

export function haarIDWT(LL: Matrix, HL: Matrix, LH: Matrix, HH: Matrix): Matrix {
  const h = LL.length;
  const w = LL[0]?.length ?? 0;
  const out: Matrix = [];
  for (let i = 0; i < h; i++) {
    const top: number[] = [], bottom: number[] = [];
    for (let j = 0; j < w; j++) {
      const ll = LL[i]![j]!, hl = HL[i]![j]!, lh = LH[i]![j]!, hh = HH[i]![j]!;
      top.push((ll + hl + lh + hh) / 2, (ll - hl + lh - hh) / 2);
      bottom.push((ll + hl - lh - hh) / 2, (ll - hl - lh + hh) / 2);
    }
    out.push(top, bottom);
  }
  return out;
}
