export interface DepthStats {
  min: number;
  max: number;
  coverage: number; // fraction of pixels holding a finite depth
}

/**
 * View-space depth per pixel, row-major. Smaller is closer; +Infinity means
 * nothing has been drawn there this frame.
 */
export class DepthBuffer {
  public width: number;
  public height: number;
  public data: Float64Array;

  constructor(width: number, height: number) {
    this.width = width;
    this.height = height;
    this.data = new Float64Array(width * height).fill(Infinity);
  }

  resize(width: number, height: number): void {
    this.width = width;
    this.height = height;
    this.data = new Float64Array(width * height).fill(Infinity);
  }

  clear(): void {
    this.data.fill(Infinity);
  }

  // -1 outside the buffer
  private indexOf(x: number, y: number): number {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) {
      return -1;
    }
    return y * this.width + x;
  }

  get(x: number, y: number): number {
    const i = this.indexOf(x, y);
    return i < 0 ? Infinity : this.data[i];
  }

  /**
   * Store depth if it is strictly closer than what is there. Equal depths
   * keep the earlier surface.
   */
  testAndSet(x: number, y: number, depth: number): boolean {
    const i = this.indexOf(x, y);
    if (i < 0 || !(depth < this.data[i])) {
      return false;
    }
    this.data[i] = depth;
    return true;
  }

  getStats(): DepthStats {
    let min = Infinity;
    let max = -Infinity;
    let filled = 0;
    for (const d of this.data) {
      if (d === Infinity) continue;
      if (d < min) min = d;
      if (d > max) max = d;
      filled++;
    }
    if (filled === 0) {
      return { min: 0, max: 0, coverage: 0 };
    }
    return { min, max, coverage: filled / this.data.length };
  }
}
