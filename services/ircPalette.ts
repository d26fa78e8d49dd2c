const DEFAULT_COLORS: readonly string[] = [
  'white',
  'black',
  'navy',
  'green',
  'red',
  'maroon',
  'purple',
  'olive',
  'yellow',
  'lightgreen',
  'teal',
  'cyan',
  'royalblue',
  'magenta',
  'gray',
  'lightgray',
];

/**
 * Maps mIRC color indices to color names (or any CSS color value).
 *
 * The palette is owned by the caller and passed by reference into each
 * formatting call, so changes take effect on the next conversion.
 */
export class IrcPalette {
  private colors = new Map<number, string>();

  constructor(overrides: Record<number, string> = {}) {
    this.reset();
    for (const [index, name] of Object.entries(overrides)) {
      this.set(Number(index), name);
    }
  }

  get(index: number, fallback: string): string {
    return this.colors.get(index) ?? fallback;
  }

  set(index: number, colorName: string) {
    this.colors.set(index, colorName);
  }

  /** Snapshot of all mapped colors, ordered by index. */
  entries(): [number, string][] {
    return [...this.colors.entries()].sort((a, b) => a[0] - b[0]);
  }

  reset() {
    this.colors.clear();
    DEFAULT_COLORS.forEach((name, index) => this.colors.set(index, name));
  }
}
