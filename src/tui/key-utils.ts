export function isSpaceKeyName(name: string): boolean {
  return name === 'SPACE' || name === ' ';
}

/**
 * terminal-kit reports printable input as the character itself and everything
 * else as an upper-case name (ENTER, CTRL_J, ...).
 */
export function isPrintableKey(name: string): boolean {
  if (isSpaceKeyName(name)) return true;
  const chars = Array.from(name);
  if (chars.length !== 1) return false;
  const code = name.codePointAt(0) ?? 0;
  return code >= 0x20 && code !== 0x7f;
}

export function keyText(name: string): string {
  return isSpaceKeyName(name) ? ' ' : name;
}
