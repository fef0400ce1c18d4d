/**
 * Output Formatter
 * 統一輸出格式處理：json | table
 */

export type OutputFormat = 'json' | 'table';

/**
 * 驗證輸出格式是否有效
 */
export function isValidFormat(format: string): format is OutputFormat {
  return format === 'json' || format === 'table';
}

/**
 * 輸出資料到 console
 * @param data 要輸出的資料
 * @param format 輸出格式
 * @param tableRenderer 若為 table 格式，使用此函數渲染
 */
export function outputData(
  data: unknown,
  format: OutputFormat = 'json',
  tableRenderer?: () => void
): void {
  if (format === 'table' && tableRenderer) {
    tableRenderer();
    return;
  }
  // 若無 table renderer，fallback 到 JSON
  console.log(JSON.stringify(data, null, 2));
}
