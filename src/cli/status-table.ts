import { intervalToDuration, type Duration } from 'date-fns';
import { MultiColumnASCIITable } from '../lib/ascii-tables';
import type { ServiceStatus, StatusSnapshot } from '../lib/orchestrator';

export const STATUS_TABLE_HEADERS = [
  'NAME',
  'STATE',
  'HEALTH',
  'PID',
  'RESTARTS',
  'UPTIME',
];

const UPTIME_UNITS: [keyof Duration, string][] = [
  ['years', 'y'],
  ['months', 'mo'],
  ['days', 'd'],
  ['hours', 'h'],
  ['minutes', 'm'],
  ['seconds', 's'],
];

/**
 * The two largest non-zero units: `3723000` -> `"1h 2m"`, `null` -> `"-"`
 */
export function formatUptime(uptimeMS: number | null): string {
  if (uptimeMS === null) {
    return '-';
  }

  const duration = intervalToDuration({ start: 0, end: uptimeMS });

  const parts = UPTIME_UNITS.flatMap(([unit, suffix]) => {
    const value = duration[unit] ?? 0;
    return value > 0 ? [`${value}${suffix}`] : [];
  });

  return parts.length > 0 ? parts.slice(0, 2).join(' ') : '0s';
}

function statusRow(service: ServiceStatus): string[] {
  return [
    service.name,
    service.state,
    service.health,
    service.pid !== null ? String(service.pid) : (service.ref ?? '-'),
    String(service.restartCount),
    formatUptime(service.uptimeMS),
  ];
}

/**
 * `stackctl status` output, one row per service in registration order
 */
export function renderStatusTable(
  snapshot: StatusSnapshot,
  options: { tableWidth?: number } = {},
): string {
  const table = new MultiColumnASCIITable(STATUS_TABLE_HEADERS, {
    tableWidth: options.tableWidth,
    emptyMessage: `No services in project ${snapshot.project}`,
  });

  for (const service of snapshot.services) {
    table.addRow(statusRow(service));
  }

  return table.toString();
}
