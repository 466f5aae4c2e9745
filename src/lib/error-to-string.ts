import { MultiColumnASCIITable } from './ascii-tables';
import { EOL } from './constants';

export interface ErrorToStringOptions {
  /** Maximum table width (default: 80) */
  maxRowLength?: number;
  /** Append the stack trace below the table (default: true) */
  includeStack?: boolean;
}

const REDACTED = '***';

function safeStringify(value: unknown): string {
  if (value === null || value === undefined) {
    return String(value);
  }

  switch (typeof value) {
    case 'string':
      return value;
    case 'number':
    case 'boolean':
    case 'bigint':
      return String(value);
    case 'function':
      return '[Function]';
    case 'symbol':
      return value.toString();
    default:
      if (value instanceof Error) {
        return value.message;
      }

      if (Array.isArray(value)) {
        return value.map((item) => safeStringify(item)).join(', ');
      }

      try {
        return JSON.stringify(value);
      } catch {
        return '[Unserializable]';
      }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function collectRows(
  error: unknown,
  keyPrefix: string,
  rows: [string, string][],
): void {
  if (!isRecord(error)) {
    rows.push([`${keyPrefix}Message`, safeStringify(error)]);
    return;
  }

  const add = (key: string, label: string): void => {
    const value = error[key];

    if (value !== undefined && value !== null && value !== '') {
      rows.push([`${keyPrefix}${label}`, safeStringify(value)]);
    }
  };

  add('message', 'Message');
  add('name', 'Name');
  add('code', 'Code');
  add('errno', 'Errno');
  add('errPrefix', 'Prefix');
  add('errType', 'errType');
  add('errCode', 'errCode');

  const additionalInfo = error['additionalInfo'];

  if (isRecord(additionalInfo)) {
    const sensitive = error['sensitiveFieldNames'];
    const sensitiveFieldNames = Array.isArray(sensitive) ? sensitive : [];

    for (const [key, value] of Object.entries(additionalInfo)) {
      rows.push([
        `${keyPrefix}AdditionalInfo.${key}`,
        sensitiveFieldNames.includes(key) ? REDACTED : safeStringify(value),
      ]);
    }
  }

  if (error['cause'] !== undefined) {
    collectRows(error['cause'], `${keyPrefix}Cause.`, rows);
  }
}

/**
 * Renders an error (or anything thrown) as a Key/Value table, followed by its
 * stack trace. Known error fields come first, then `additionalInfo` entries,
 * then the `cause` chain with a `Cause.` prefix per level.
 *
 * Keys listed in an error's `sensitiveFieldNames` are masked.
 */
export function errorToString(
  error: unknown,
  options: ErrorToStringOptions = {},
): string {
  const table = new MultiColumnASCIITable(['Key', 'Value'], {
    tableWidth: options.maxRowLength ?? 80,
  });

  const rows: [string, string][] = [];
  collectRows(error, '', rows);

  for (const row of rows) {
    table.addRow(row);
  }

  let output = table.toString();

  const stack = isRecord(error) ? error['stack'] : undefined;

  if ((options.includeStack ?? true) && typeof stack === 'string') {
    output += EOL + stack;
  }

  return output;
}
