const NAMED_COLORS: Record<string, string> = {
  black: '#000000',
  red: '#cd0000',
  green: '#00cd00',
  yellow: '#cdcd00',
  blue: '#0000ee',
  magenta: '#cd00cd',
  cyan: '#00cdcd',
  gray: '#808080',
  grey: '#808080',
  darkgray: '#555555',
  darkgrey: '#555555',
  lightred: '#ff5555',
  lightgreen: '#55ff55',
  lightyellow: '#ffff55',
  lightblue: '#5555ff',
  lightmagenta: '#ff55ff',
  lightcyan: '#55ffff',
  white: '#ffffff',
};

function toHexByte(value: number): string {
  return value.toString(16).padStart(2, '0');
}

/**
 * Normalizes a color to `#rrggbb`.
 *
 * Accepts `#rgb`, `#rrggbb`, `rgb(r, g, b)` and the basic terminal color
 * names (`red`, `lightblue`, `dark_gray`, ...). Returns null when the value
 * is not a color.
 */
export function parseColor(value: string): string | null {
  const input = value.trim().toLowerCase();

  const shortHex = /^#([0-9a-f])([0-9a-f])([0-9a-f])$/.exec(input);
  if (shortHex) {
    const [, r = '0', g = '0', b = '0'] = shortHex;
    return `#${r}${r}${g}${g}${b}${b}`;
  }

  if (/^#[0-9a-f]{6}$/.test(input)) {
    return input;
  }

  const rgb = /^rgb\(\s*(\d{1,3})\s*,\s*(\d{1,3})\s*,\s*(\d{1,3})\s*\)$/.exec(input);
  if (rgb) {
    const channels = rgb.slice(1, 4).map((part) => Number.parseInt(part, 10));
    if (channels.some((channel) => channel > 255)) {
      return null;
    }
    return `#${channels.map(toHexByte).join('')}`;
  }

  const name = input.replace(/[\s_-]/g, '');
  return NAMED_COLORS[name] ?? null;
}
