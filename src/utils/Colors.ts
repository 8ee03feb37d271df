// Terminal escape sequences and the RGB colour type shared by meshes, lights
// and the compositor

const ESC = '\x1b[';

export const RESET = `${ESC}0m`;

// 24-bit SGR colour: 38 selects the foreground, 48 the background
function sgrRGB(layer: 38 | 48, r: number, g: number, b: number): string {
  return `${ESC}${layer};2;${r};${g};${b}m`;
}

export function fgRGB(r: number, g: number, b: number): string {
  return sgrRGB(38, r, g, b);
}

export function bgRGB(r: number, g: number, b: number): string {
  return sgrRGB(48, r, g, b);
}

function toByte(value: number): number {
  return Math.max(0, Math.min(255, Math.trunc(value)));
}

/**
 * RGB colour with 0-255 channels. Mesh vertex colours, light colours, the
 * ambient term and the clear colour all use it. Alpha only marks whether a
 * framebuffer pixel was written.
 */
export class Color {
  constructor(
    public r: number = 0,
    public g: number = 0,
    public b: number = 0,
    public a: number = 1
  ) {}

  static black(): Color {
    return new Color(0, 0, 0);
  }

  static white(): Color {
    return new Color(255, 255, 255);
  }

  static gray(level: number = 128): Color {
    return new Color(level, level, level);
  }

  // "#rrggbb" or "rrggbb"; anything else is black
  static fromHex(hex: string): Color {
    const match = /^#?([0-9a-f]{6})$/i.exec(hex);
    if (!match) {
      return Color.black();
    }
    const value = parseInt(match[1], 16);
    return new Color((value >> 16) & 0xff, (value >> 8) & 0xff, value & 0xff);
  }

  static fromArray(rgb: readonly [number, number, number]): Color {
    return new Color(rgb[0], rgb[1], rgb[2]);
  }

  clone(): Color {
    return new Color(this.r, this.g, this.b, this.a);
  }

  clamped(): Color {
    return new Color(toByte(this.r), toByte(this.g), toByte(this.b), this.a);
  }

  toFgAnsi(): string {
    return fgRGB(this.r, this.g, this.b);
  }

  toBgAnsi(): string {
    return bgRGB(this.r, this.g, this.b);
  }

  toHex(): string {
    return '#' + this.toArray().map(c => c.toString(16).padStart(2, '0')).join('');
  }

  toArray(): [number, number, number] {
    return [this.r, this.g, this.b];
  }

  equals(other: Color): boolean {
    return this.r === other.r && this.g === other.g && this.b === other.b && this.a === other.a;
  }

  toString(): string {
    return `RGB(${this.r}, ${this.g}, ${this.b})`;
  }
}

// Screen control
export const CURSOR_HOME = `${ESC}H`;
export const CURSOR_HIDE = `${ESC}?25l`;
export const CURSOR_SHOW = `${ESC}?25h`;
export const CLEAR_SCREEN = `${ESC}2J`;
export const ALT_SCREEN_ON = `${ESC}?1049h`;
export const ALT_SCREEN_OFF = `${ESC}?1049l`;

// OSC 2 sets the window title
export function SET_TITLE(title: string): string {
  return `\x1b]2;${title}\x07`;
}
