/**
 * Test fixture helpers
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

/**
 * 讀取 tests/fixtures 下的 JSON
 */
export function loadFixture(name: string): unknown {
  const url = new URL(`../fixtures/${name}`, import.meta.url);
  return JSON.parse(fs.readFileSync(url, 'utf-8'));
}

/**
 * 建立暫存目錄
 */
export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `${prefix}-`));
}
