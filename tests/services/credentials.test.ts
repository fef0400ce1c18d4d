import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { CredentialStore } from '../../src/services/credentials.js';
import { ConfigurationError } from '../../src/lib/errors.js';
import { makeTempDir } from '../helpers/fixtures.js';

describe('CredentialStore', () => {
  let tempDir: string;
  let filePath: string;
  let store: CredentialStore;

  const writeFile = (content: string): void => {
    fs.writeFileSync(filePath, content, 'utf-8');
  };

  beforeEach(() => {
    tempDir = makeTempDir('ff-standings-cred');
    filePath = path.join(tempDir, 'oauth2.json');
    store = new CredentialStore(filePath);
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('load', () => {
    it('should throw ConfigurationError when the file is missing', () => {
      expect(() => store.load()).toThrow(ConfigurationError);
      expect(() => store.load()).toThrow('找不到憑證檔');
    });

    it('should throw ConfigurationError for invalid JSON', () => {
      writeFile('{ consumer_key: ');
      expect(() => store.load()).toThrow(ConfigurationError);
      expect(() => store.load()).toThrow('不是有效的 JSON');
    });

    it('should throw ConfigurationError when required fields are missing', () => {
      writeFile(JSON.stringify({ consumer_key: 'test-key' }));
      expect(() => store.load()).toThrow(/格式錯誤：consumer_secret/);
    });

    it('should reject empty consumer_key', () => {
      writeFile(JSON.stringify({ consumer_key: '  ', consumer_secret: 'test-secret' }));
      expect(() => store.load()).toThrow('consumer_key 不可為空');
    });

    it('should reject a non-numeric token_time', () => {
      writeFile(JSON.stringify({ consumer_key: 'k', consumer_secret: 's', token_time: 'yesterday' }));
      expect(() => store.load()).toThrow(/token_time/);
    });

    it('should accept null guid and token_type', () => {
      writeFile(
        JSON.stringify({
          consumer_key: 'test-key',
          consumer_secret: 'test-secret',
          access_token: 'test-access',
          token_time: 1700000000,
          token_type: null,
          guid: null,
        })
      );

      const record = store.load();
      expect(record.guid).toBeNull();
      expect(record.token_type).toBeNull();
    });

    it('should default redirect_uri to oob', () => {
      writeFile(JSON.stringify({ consumer_key: 'test-key', consumer_secret: 'test-secret' }));
      expect(store.load().redirect_uri).toBe('oob');
    });

    it('should load a full record and keep unknown fields', () => {
      writeFile(
        JSON.stringify({
          consumer_key: 'test-key',
          consumer_secret: 'test-secret',
          redirect_uri: 'http://localhost:8080/callback',
          access_token: 'test-access',
          refresh_token: 'test-refresh',
          token_time: 1700000000.5,
          token_type: 'bearer',
          extra_field: 'kept',
        })
      );

      const record = store.load();
      expect(record.access_token).toBe('test-access');
      expect(record.refresh_token).toBe('test-refresh');
      expect(record.token_time).toBe(1700000000.5);
      expect(record.extra_field).toBe('kept');
    });
  });

  describe('save', () => {
    it('should write the record back to the same file', () => {
      writeFile(JSON.stringify({ consumer_key: 'test-key', consumer_secret: 'test-secret' }));
      const record = store.load();

      store.save({ ...record, access_token: 'new-access', token_time: 1700000100 });

      const reloaded = new CredentialStore(filePath).load();
      expect(reloaded.access_token).toBe('new-access');
      expect(reloaded.token_time).toBe(1700000100);
      expect(reloaded.consumer_key).toBe('test-key');
    });

    it('should keep fractional token_time through save and load', () => {
      store.save({ consumer_key: 'k', consumer_secret: 's', redirect_uri: 'oob', token_time: 1700000123.456789 });

      expect(fs.readFileSync(filePath, 'utf-8')).toContain('"token_time": 1700000123.456789');
      expect(new CredentialStore(filePath).load().token_time).toBe(1700000123.456789);
    });

    it('should not leave temp files behind', () => {
      store.save({ consumer_key: 'k', consumer_secret: 's', redirect_uri: 'oob' });
      expect(fs.readdirSync(tempDir)).toEqual(['oauth2.json']);
    });

    it('should report its resolved path', () => {
      expect(store.getPath()).toBe(path.resolve(filePath));
    });
  });
});
