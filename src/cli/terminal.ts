export const supportsAnsiColor = Boolean(process.stdout.isTTY) && !process.env.NO_COLOR;

function wrap(open: number, close: number, text: string): string {
  return supportsAnsiColor ? `\u001b[${open}m${text}\u001b[${close}m` : text;
}

export function boldText(text: string): string {
  return wrap(1, 22, text);
}

export function dimText(text: string): string {
  return wrap(2, 22, text);
}

export function redText(text: string): string {
  return wrap(31, 39, text);
}

export function greenText(text: string): string {
  return wrap(32, 39, text);
}

export function yellowText(text: string): string {
  return wrap(33, 39, text);
}

export function cyanText(text: string): string {
  return wrap(36, 39, text);
}
