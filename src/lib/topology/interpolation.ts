/**
 * `${NAME}`, `${NAME:-default}` and `$$` (a literal `$`)
 */
const REFERENCE_PATTERN = /\$\$|\$\{([A-Za-z_][A-Za-z0-9_]*)(?::-([^}]*))?\}/g;

export type VariableLookup = Record<string, string | undefined>;

export type InterpolationResult =
  | { ok: true; value: string; interpolated: boolean }
  | { ok: false; missing: string };

/**
 * Replaces variable references in `template` with values from `variables`.
 * `${NAME:-default}` falls back to the default when NAME is unset or empty;
 * a plain `${NAME}` that is unset is reported as missing.
 *
 * `interpolated` is true when at least one variable was substituted, which
 * makes the value secret as far as logging is concerned.
 */
export function interpolate(
  template: string,
  variables: VariableLookup,
): InterpolationResult {
  const substituted: string[] = [];
  const missing: string[] = [];

  const value = template.replace(
    REFERENCE_PATTERN,
    (match: string, name: string | undefined, fallback: string | undefined) => {
      if (name === undefined) {
        return '$';
      }

      substituted.push(name);
      const current = variables[name];

      if (fallback !== undefined) {
        return current === undefined || current === '' ? fallback : current;
      }

      if (current === undefined) {
        missing.push(name);
        return match;
      }

      return current;
    },
  );

  const [firstMissing] = missing;

  if (firstMissing !== undefined) {
    return { ok: false, missing: firstMissing };
  }

  return { ok: true, value, interpolated: substituted.length > 0 };
}
