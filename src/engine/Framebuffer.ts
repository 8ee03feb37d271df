import { Color, RESET, fgRGB, bgRGB } from '../utils/Colors.js';

// Upper half-block: foreground paints the top half, background the bottom
export const UPPER_HALF = '▀';

/**
 * RGBA pixel store. Alpha is 0 for cleared pixels and 1 for pixels a mesh
 * wrote this frame.
 */
export class Framebuffer {
  public width: number;
  public height: number;
  public data: Uint8Array;

  private clearColor: Color = new Color(12, 12, 20);

  constructor(width: number, height: number, clearColor?: Color) {
    this.width = width;
    this.height = height;
    if (clearColor) {
      this.clearColor = clearColor.clone();
    }
    this.data = new Uint8Array(width * height * 4);
    this.clear();
  }

  resize(width: number, height: number): void {
    this.width = width;
    this.height = height;
    this.data = new Uint8Array(width * height * 4);
    this.clear();
  }

  setClearColor(color: Color): void {
    this.clearColor = color.clone();
  }

  getClearColor(): Color {
    return this.clearColor.clone();
  }

  clear(): void {
    const { r, g, b } = this.clearColor;
    const data = this.data;
    for (let i = 0; i < data.length; i += 4) {
      data[i] = r;
      data[i + 1] = g;
      data[i + 2] = b;
      data[i + 3] = 0;
    }
  }

  setPixel(x: number, y: number, r: number, g: number, b: number): void {
    if (x < 0 || x >= this.width || y < 0 || y >= this.height) {
      return;
    }
    const i = (y * this.width + x) * 4;
    this.data[i] = r;
    this.data[i + 1] = g;
    this.data[i + 2] = b;
    this.data[i + 3] = 1;
  }

  getPixel(x: number, y: number): Color | null {
    if (x < 0 || x >= this.width || y < 0 || y >= this.height) {
      return null;
    }
    const i = (y * this.width + x) * 4;
    return new Color(this.data[i], this.data[i + 1], this.data[i + 2], this.data[i + 3]);
  }

  isWritten(x: number, y: number): boolean {
    if (x < 0 || x >= this.width || y < 0 || y >= this.height) {
      return false;
    }
    return this.data[(y * this.width + x) * 4 + 3] === 1;
  }

  countWritten(): number {
    let count = 0;
    for (let i = 3; i < this.data.length; i += 4) {
      if (this.data[i] === 1) count++;
    }
    return count;
  }

  /**
   * Downsample into charHeight lines of charWidth half-block cells.
   *
   * Each cell averages an n x n block (n = max(1, floor(factor))) for its top
   * and bottom halves. Colour codes are only emitted when they change within
   * a line, and every line ends with a reset.
   */
  toHalfBlockLines(charWidth: number, charHeight: number, factor: number): string[] {
    const lines: string[] = [];
    const n = Math.max(1, Math.floor(factor));
    const samples = n * n;
    const pw = this.width;
    const ph = this.height;
    const data = this.data;

    if (pw === 0 || ph === 0) {
      return lines;
    }

    for (let cy = 0; cy < charHeight; cy++) {
      const topBase = Math.floor(cy * 2 * factor);
      const botBase = Math.floor((cy * 2 + 1) * factor);
      let line = '';
      let currentFg: string | null = null;
      let currentBg: string | null = null;

      for (let cx = 0; cx < charWidth; cx++) {
        const colBase = Math.floor(cx * factor);
        let tr = 0, tg = 0, tb = 0;
        let br = 0, bg = 0, bb = 0;

        for (let sy = 0; sy < n; sy++) {
          const ty = Math.min(topBase + sy, ph - 1);
          const by = Math.min(botBase + sy, ph - 1);
          for (let sx = 0; sx < n; sx++) {
            const px = Math.min(colBase + sx, pw - 1);
            const ti = (ty * pw + px) * 4;
            const bi = (by * pw + px) * 4;
            tr += data[ti]; tg += data[ti + 1]; tb += data[ti + 2];
            br += data[bi]; bg += data[bi + 1]; bb += data[bi + 2];
          }
        }

        const fgAnsi = fgRGB(
          Math.floor(tr / samples), Math.floor(tg / samples), Math.floor(tb / samples)
        );
        const bgAnsi = bgRGB(
          Math.floor(br / samples), Math.floor(bg / samples), Math.floor(bb / samples)
        );

        // Only emit color codes when they change
        if (fgAnsi !== currentFg) {
          line += fgAnsi;
          currentFg = fgAnsi;
        }
        if (bgAnsi !== currentBg) {
          line += bgAnsi;
          currentBg = bgAnsi;
        }

        line += UPPER_HALF;
      }

      lines.push(line + RESET);
    }

    return lines;
  }
}
