const ISO_8601 =
  /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d{1,9})?)?)(Z|[+-]\d{2}(?::?\d{2})?)?)?$/i;

/**
 * Parses an ISO 8601 date or datetime. Values without a zone are taken as UTC.
 * Returns null for anything unparseable, including calendar dates that do not
 * exist such as February 30.
 */
export function parseIsoDatetime(value: string | Date | null | undefined): Date | null {
  if (value === null || value === undefined) return null;

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }

  const match = ISO_8601.exec(value.trim());
  if (!match) return null;

  const [, date, time, zone] = match;
  if (!isCalendarDate(date)) return null;

  let normalized = date;
  if (time !== undefined) {
    normalized += `T${time}${normalizeZone(zone)}`;
  }

  const parsed = new Date(normalized);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

function isCalendarDate(date: string): boolean {
  const [year, month, day] = date.split('-').map(Number);
  const check = new Date(Date.UTC(year, month - 1, day));
  return (
    check.getUTCFullYear() === year && check.getUTCMonth() === month - 1 && check.getUTCDate() === day
  );
}

function normalizeZone(zone: string | undefined): string {
  if (zone === undefined || zone.toUpperCase() === 'Z') return 'Z';
  const digits = zone.slice(1).replace(':', '');
  const minutes = digits.length > 2 ? digits.slice(2) : '00';
  return `${zone[0]}${digits.slice(0, 2)}:${minutes}`;
}
