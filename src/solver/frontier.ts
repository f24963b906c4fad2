/**
 * Binary min-heap keyed by a numeric priority.
 * Entries with equal keys come out in insertion order.
 */
export class PriorityQueue<T> {
  private a: { k: number; seq: number; v: T }[] = [];
  private counter = 0;

  size(): number {
    return this.a.length;
  }

  push(k: number, v: T): void {
    this.a.push({ k, seq: this.counter++, v });
    this.bubbleUp(this.a.length - 1);
  }

  pop(): T | undefined {
    const top = this.a[0];
    const last = this.a.pop();
    if (top === undefined || last === undefined) return undefined;
    if (this.a.length) {
      this.a[0] = last;
      this.bubbleDown(0);
    }
    return top.v;
  }

  peekKey(): number | undefined {
    return this.a[0]?.k;
  }

  private less(i: number, j: number): boolean {
    const x = this.a[i];
    const y = this.a[j];
    return x.k < y.k || (x.k === y.k && x.seq < y.seq);
  }

  private swap(i: number, j: number): void {
    [this.a[i], this.a[j]] = [this.a[j], this.a[i]];
  }

  private bubbleUp(i: number): void {
    while (i > 0) {
      const p = (i - 1) >> 1;
      if (!this.less(i, p)) break;
      this.swap(i, p);
      i = p;
    }
  }

  private bubbleDown(i: number): void {
    const n = this.a.length;
    while (true) {
      const l = i * 2 + 1;
      const r = l + 1;
      let m = i;
      if (l < n && this.less(l, m)) m = l;
      if (r < n && this.less(r, m)) m = r;
      if (m === i) break;
      this.swap(m, i);
      i = m;
    }
  }
}
