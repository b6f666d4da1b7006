/**
 * Fixed-size character grid. Writes outside the grid are dropped.
 */
export class AsciiCanvas {
  readonly width: number;
  readonly height: number;
  private readonly grid: string[][];

  constructor(width: number, height: number) {
    this.width = Math.max(0, Math.floor(width));
    this.height = Math.max(0, Math.floor(height));
    this.grid = Array.from({ length: this.height }, () => new Array<string>(this.width).fill(' '));
  }

  set(x: number, y: number, ch: string): void {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) return;
    this.grid[y][x] = ch;
  }

  get(x: number, y: number): string | undefined {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) return undefined;
    return this.grid[y][x];
  }

  /** Writes a string left to right, one code point per cell. */
  write(x: number, y: number, text: string): void {
    let col = x;
    for (const ch of text) {
      this.set(col, y, ch);
      col++;
    }
  }

  lines(): string[] {
    return this.grid.map(row => row.join(''));
  }

  clone(): AsciiCanvas {
    const copy = new AsciiCanvas(this.width, this.height);
    this.grid.forEach((row, y) => row.forEach((ch, x) => copy.set(x, y, ch)));
    return copy;
  }

  /** Every row followed by a newline, the plain-text export format. */
  toString(): string {
    return this.lines().map(line => `${line}\n`).join('');
  }
}
