// Fixed-width column helpers for the plain-text report lines.

export function padLeft(value: string | number, width: number): string {
  return String(value).padStart(width, ' ');
}

export function padRight(value: string | number, width: number): string {
  return String(value).padEnd(width, ' ');
}

export function fixed(value: number, width: number, digits: number): string {
  return padLeft(value.toFixed(digits), width);
}

export function baseName(path: string): string {
  const slash = path.lastIndexOf('/');
  return slash === -1 ? path : path.slice(slash + 1);
}
