/**
 * DB-HELPERS - Value Conversion & Formatters
 *
 * Shared conversions between raw MongoDB field values and spreadsheet text.
 * All date output is in UTC so a report's content depends only on the data.
 */

// ============================================
// VALUE EXTRACTION
// ============================================

/**
 * Safely extracts an integer from a document value (truncates decimals).
 */
export function toInt(value: unknown): number {
  if (value === null || value === undefined) return 0;
  const num = typeof value === 'number' ? Math.trunc(value) : parseInt(String(value), 10);
  return isNaN(num) ? 0 : num;
}

// ============================================
// DATE FORMATTING
// ============================================

function pad(value: number, length: number = 2): string {
  return String(value).padStart(length, '0');
}

/**
 * YYYY-MM-DD
 */
export function formatIsoDate(date: Date): string {
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

/**
 * YYYY-MM-DD HH:mm:ss
 */
export function formatTimestamp(date: Date): string {
  return `${formatIsoDate(date)} ${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
}

/**
 * MM/DD/YYYY
 */
export function formatUsDate(date: Date): string {
  return `${pad(date.getUTCMonth() + 1)}/${pad(date.getUTCDate())}/${date.getUTCFullYear()}`;
}

/**
 * Converts microseconds since the epoch into YYYYMMDD_HHMMSSffffff.
 */
export function formatFileStamp(epochMicros: number): string {
  const date = new Date(Math.floor(epochMicros / 1000));
  const micros = epochMicros % 1_000_000;
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}_` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}${pad(micros, 6)}`
  );
}

// ============================================
// NUMBER FORMATTING
// ============================================

/**
 * Groups thousands with commas and keeps two decimals: 1234.5 → "1,234.50"
 */
export function formatCurrency(value: number): string {
  const [integerPart, decimalPart] = Math.abs(value).toFixed(2).split('.');
  const grouped = integerPart.replace(/\B(?=(\d{3})+(?!\d))/g, ',');
  const sign = value < 0 && Number(integerPart + decimalPart) !== 0 ? '-' : '';
  return `${sign}${grouped}.${decimalPart}`;
}
