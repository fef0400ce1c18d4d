/**
 * Output Formatter Module
 * 輸出格式化模組 - CSV 與 JSON
 */

/**
 * 欄位定義
 */
export interface ColumnDef<T> {
  key: keyof T & string;
  label: string;
  format?: (value: T[keyof T], row: T) => string;
}

/**
 * 單一欄位值轉字串，null/undefined 為空字串
 */
export function cellValue<T>(row: T, column: ColumnDef<T>): string {
  const value = row[column.key];
  if (column.format) {
    return column.format(value, row);
  }
  return value === null || value === undefined ? '' : String(value);
}

/**
 * CSV 欄位跳脫（RFC 4180）
 */
export function escapeCSV(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * 格式化 CSV：表頭一定會輸出，即使沒有資料列
 */
export function formatCSV<T>(data: readonly T[], columns: readonly ColumnDef<T>[]): string {
  const lines: string[] = [];

  // 表頭
  lines.push(columns.map((col) => escapeCSV(col.label)).join(','));

  // 資料列
  for (const row of data) {
    lines.push(columns.map((col) => escapeCSV(cellValue(row, col))).join(','));
  }

  return lines.join('\n');
}

/**
 * 格式化 JSON
 */
export function formatJSON<T>(data: T, pretty: boolean = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}
