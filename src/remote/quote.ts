/** Quote a value for a POSIX shell. */
export function shellQuote(value: string): string {
  if (value !== '' && /^[A-Za-z0-9_\/.,:=+@%-]+$/.test(value)) return value;
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Quote a remote path while keeping a leading ~ expandable: "~/apps/x" becomes "$HOME"/apps/x.
 */
export function remotePath(p: string): string {
  if (p === '~') return '"$HOME"';
  if (p.startsWith('~/')) return `"$HOME"/${shellQuote(p.slice(2))}`;
  return shellQuote(p);
}
