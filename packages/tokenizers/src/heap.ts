/**
 * Binary max-heap ordered by a caller-supplied `before` relation.
 */
export class MaxHeap<T> {
  private readonly _data: T[];
  private readonly _before: (a: T, b: T) => boolean;

  /** `before(a, b)` is true when `a` should come out ahead of `b`. */
  constructor(before: (a: T, b: T) => boolean, entries: readonly T[] = []) {
    this._before = before;
    this._data = entries.slice();
    for (let i = Math.floor(this._data.length / 2) - 1; i >= 0; i--) {
      this._siftDown(i);
    }
  }

  get size(): number {
    return this._data.length;
  }

  push(entry: T): void {
    this._data.push(entry);
    this._siftUp(this._data.length - 1);
  }

  pop(): T | undefined {
    const top = this._data[0];
    const last = this._data.pop();
    if (this._data.length > 0 && last !== undefined) {
      this._data[0] = last;
      this._siftDown(0);
    }
    return top;
  }

  private _siftUp(index: number): void {
    while (index > 0) {
      const parent = Math.floor((index - 1) / 2);
      if (!this._before(this._data[index], this._data[parent])) break;
      this._swap(index, parent);
      index = parent;
    }
  }

  private _siftDown(index: number): void {
    const length = this._data.length;
    while (true) {
      const left = index * 2 + 1;
      const right = left + 1;
      let first = index;
      if (left < length && this._before(this._data[left], this._data[first])) first = left;
      if (right < length && this._before(this._data[right], this._data[first])) first = right;
      if (first === index) break;
      this._swap(index, first);
      index = first;
    }
  }

  private _swap(i: number, j: number): void {
    const tmp = this._data[i];
    this._data[i] = this._data[j];
    this._data[j] = tmp;
  }
}
