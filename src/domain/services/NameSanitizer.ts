const UNSAFE_CHARACTERS = /[^0-9a-zA-Z_]/g;

/**
 * Make a raw file or header name safe to use as an SQL identifier: every
 * character outside `[0-9A-Za-z_]` becomes `_`, and a leading digit gets an
 * `_` prefix.
 */
export function sanitizeName(raw: string): string {
  const replaced = raw.replace(UNSAFE_CHARACTERS, '_');
  return /^[0-9]/.test(replaced) ? `_${replaced}` : replaced;
}

/**
 * Return `name`, or the first of `name_2`, `name_3`, … not already in
 * `taken`. SQLite identifiers are case-insensitive, so `taken` holds lowercased
 * names and the chosen name is added to it.
 */
export function uniqueName(name: string, taken: Set<string>): string {
  let candidate = name;
  let suffix = 2;
  while (taken.has(candidate.toLowerCase())) {
    candidate = `${name}_${String(suffix)}`;
    suffix++;
  }
  taken.add(candidate.toLowerCase());
  return candidate;
}

export interface HeaderColumn {
  readonly originalName: string;
  readonly name: string;
}

/**
 * Sanitize a header row into unique column names.
 *
 * Blank cells are named `col_<n>` (1-based position). A sanitized name that
 * collides with an earlier column falls back to `col_<n>` as well, with a
 * numeric suffix if even that is taken.
 */
export function headerColumns(header: readonly string[], sanitize: (raw: string) => string = sanitizeName): HeaderColumn[] {
  const taken = new Set<string>();

  return header.map((cell, i) => {
    const positional = `col_${String(i + 1)}`;
    const trimmed = cell.trim();
    const originalName = trimmed === '' ? positional : trimmed;
    const sanitized = sanitize(originalName);
    const preferred = sanitized === '' || taken.has(sanitized.toLowerCase()) ? positional : sanitized;

    return { originalName, name: uniqueName(preferred, taken) };
  });
}
