const PLACEHOLDER_PATTERN = /(?:\\)?{{(\s*[\w.]+?)(?:\\)?\s*}}/g;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Replaces `{{key}}` placeholders in a log template with values from `locals`.
 * Dotted keys (`{{exit.code}}`) walk into nested objects. A placeholder
 * escaped with a leading backslash (`\{{key}}`) is emitted literally.
 *
 * @param str - The template, e.g. `Service {{name}} exited with {{code}}`
 * @param locals - Placeholder values
 * @param fallback - Used when a placeholder has no value
 *
 * ```typescript
 * CurlyBrackets('Restarting {{name}} in {{delayMS}}ms', { name: 'db', delayMS: 2000 });
 * // 'Restarting db in 2000ms'
 * ```
 */
export function CurlyBrackets(
  str: string = '',
  locals: Record<string, unknown> = {},
  fallback: string = '(null)',
): string {
  if (!str.includes('{{')) {
    return str;
  }

  return str.replace(PLACEHOLDER_PATTERN, (match, p1: string) => {
    if (match.startsWith('\\')) {
      return match.slice(1);
    }

    let replacement: unknown = locals;

    for (const part of p1.trim().split('.')) {
      if (isRecord(replacement) && part in replacement) {
        replacement = replacement[part];
      } else {
        replacement = undefined;
        break;
      }
    }

    if (replacement === undefined || replacement === null) {
      return fallback;
    }

    if (Array.isArray(replacement)) {
      return replacement.map((item) => String(item)).join(', ');
    }

    if (replacement instanceof Error) {
      return replacement.message;
    }

    return typeof replacement === 'object'
      ? JSON.stringify(replacement)
      : String(replacement);
  });
}
