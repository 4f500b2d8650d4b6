/** Render a stored timestamp for the wire; pg may hand back a Date or a string */
export function toIsoString(value: Date | string): string;
export function toIsoString(value: Date | string | null): string | null;
export function toIsoString(value: Date | string | null): string | null {
  if (value === null) return null;
  return (value instanceof Date ? value : new Date(value)).toISOString();
}
