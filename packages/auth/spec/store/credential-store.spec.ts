import { mkdtemp, readFile, rm, stat, writeFile, mkdir } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { CredentialStore } from '#store/credential-store';

import { createMemoryKeychain } from '../mocks/keychain';

import type { Log } from '@forcelink/core';

import type { TokenRecord } from '#oauth/types';

const record: TokenRecord = {
  accessToken: 'test-access-token',
  refreshToken: 'test-refresh-token',
  instanceUrl: 'https://example.my.salesforce.com',
  issuedAt: 1_700_000_000_000,
  expiresAt: 1_700_003_600_000,
};

let configDirectory: string;

beforeEach(async () => {
  configDirectory = await mkdtemp(join(tmpdir(), 'forcelink-store-'));
});

afterEach(async () => {
  await rm(configDirectory, { recursive: true, force: true });
});

describe('cl:CredentialStore', () => {
  describe('mt:save', () => {
    it('should write each field under its own keychain account', async () => {
      const keychain = createMemoryKeychain();
      const store = new CredentialStore({
        serviceId: 'forcelink-test',
        configDirectory,
        keychainLoader: async () => keychain,
      });

      const source = await store.save(record);

      expect(source).toBe('keychain');
      expect(Object.fromEntries(keychain.entries)).toEqual({
        'forcelink-test/access_token': 'test-access-token',
        'forcelink-test/refresh_token': 'test-refresh-token',
        'forcelink-test/instance_url': 'https://example.my.salesforce.com',
        'forcelink-test/expires_at': '1700003600000',
        'forcelink-test/issued_at': '1700000000000',
      });
    });

    it('should delete the refresh token entry when the record has none', async () => {
      const keychain = createMemoryKeychain();
      const store = new CredentialStore({
        serviceId: 'forcelink-test',
        configDirectory,
        keychainLoader: async () => keychain,
      });

      await store.save(record);
      await store.save({ ...record, refreshToken: undefined });

      expect(keychain.entries.has('forcelink-test/refresh_token')).toBe(false);
      expect(await store.load()).toEqual({
        accessToken: 'test-access-token',
        instanceUrl: 'https://example.my.salesforce.com',
        issuedAt: 1_700_000_000_000,
        expiresAt: 1_700_003_600_000,
      });
    });

    it('should fall back to an owner-only file when no keychain is available', async () => {
      const store = new CredentialStore({
        serviceId: 'forcelink-test',
        configDirectory,
        keychainLoader: null,
      });

      const source = await store.save(record);

      expect(source).toBe('file');
      expect(store.filePath).toBe(
        join(configDirectory, 'forcelink-test', 'oauth_tokens.txt'),
      );
      expect(await readFile(store.filePath, 'utf-8')).toBe(
        [
          'test-access-token',
          'test-refresh-token',
          'https://example.my.salesforce.com',
          '1700003600000',
          '1700000000000',
        ].join('\n'),
      );

      if (process.platform !== 'win32') {
        expect((await stat(store.filePath)).mode & 0o777).toBe(0o600);
        expect((await stat(dirname(store.filePath))).mode & 0o777).toBe(0o700);
      }
    });

    it('should fall back to the file when a keychain write fails', async () => {
      const log = vi.fn<Log>();
      const keychain = createMemoryKeychain();
      keychain.setPassword = vi.fn(async () => {
        throw new Error('secret service locked');
      });

      const store = new CredentialStore({
        serviceId: 'forcelink-test',
        configDirectory,
        keychainLoader: async () => keychain,
        log,
      });

      const source = await store.save(record);

      expect(source).toBe('file');
      expect(log).toHaveBeenCalledWith(
        'warn',
        'keychain write failed, falling back to file',
        expect.objectContaining({ serviceId: 'forcelink-test' }),
      );
      expect(await readFile(store.filePath, 'utf-8')).toContain(
        'test-access-token',
      );
    });

    it('should never log secret values', async () => {
      const log = vi.fn<Log>();
      const store = new CredentialStore({
        serviceId: 'forcelink-test',
        configDirectory,
        keychainLoader: async () => createMemoryKeychain(),
        log,
      });

      await store.save(record);
      await store.load();

      const logged = JSON.stringify(log.mock.calls);

      expect(logged).not.toContain('test-access-token');
      expect(logged).not.toContain('test-refresh-token');
    });
  });

  describe('mt:load', () => {
    it('should return null when nothing is stored', async () => {
      const store = new CredentialStore({
        serviceId: 'forcelink-test',
        configDirectory,
        keychainLoader: async () => createMemoryKeychain(),
      });

      expect(await store.load()).toBeNull();
    });

    it('should reload exactly what was saved through the keychain', async () => {
      const store = new CredentialStore({
        serviceId: 'forcelink-test',
        configDirectory,
        keychainLoader: async () => createMemoryKeychain(),
      });

      await store.save(record);

      expect(await store.load()).toEqual(record);
    });

    it('should reload exactly what was saved through the file', async () => {
      const store = new CredentialStore({
        serviceId: 'forcelink-test',
        configDirectory,
        keychainLoader: null,
      });

      await store.save(record);

      expect(await store.load()).toEqual(record);
    });

    it('should read the file when the keychain holds nothing', async () => {
      await new CredentialStore({
        serviceId: 'forcelink-test',
        configDirectory,
        keychainLoader: null,
      }).save(record);

      const store = new CredentialStore({
        serviceId: 'forcelink-test',
        configDirectory,
        keychainLoader: async () => createMemoryKeychain(),
      });

      expect(await store.load()).toEqual(record);
    });

    it('should assume a one hour lifetime for a file without an issue time', async () => {
      const filePath = join(configDirectory, 'forcelink-test', 'oauth_tokens.txt');

      await mkdir(dirname(filePath), { recursive: true });
      await writeFile(
        filePath,
        'test-access-token\n\nhttps://example.my.salesforce.com\n1700003600000\n',
      );

      const store = new CredentialStore({
        serviceId: 'forcelink-test',
        configDirectory,
        keychainLoader: null,
      });

      expect(await store.load()).toEqual({
        accessToken: 'test-access-token',
        instanceUrl: 'https://example.my.salesforce.com',
        issuedAt: 1_700_000_000_000,
        expiresAt: 1_700_003_600_000,
      });
    });

    it('should ignore a record with a malformed expiry', async () => {
      const log = vi.fn<Log>();
      const keychain = createMemoryKeychain();
      const store = new CredentialStore({
        serviceId: 'forcelink-test',
        configDirectory,
        keychainLoader: async () => keychain,
        log,
      });

      await store.save(record);
      keychain.entries.set('forcelink-test/expires_at', 'soon');

      expect(await store.load()).toBeNull();
      expect(log).toHaveBeenCalledWith(
        'warn',
        'ignoring malformed stored credentials',
        {
          source: 'keychain',
          hasAccessToken: true,
          hasInstanceUrl: true,
          expiresAt: 'soon',
          issuedAt: '1700000000000',
        },
      );
    });
  });

  describe('mt:clear', () => {
    it('should remove keychain entries and the file', async () => {
      const keychain = createMemoryKeychain();
      const store = new CredentialStore({
        serviceId: 'forcelink-test',
        configDirectory,
        keychainLoader: async () => keychain,
      });

      await store.save(record);
      await new CredentialStore({
        serviceId: 'forcelink-test',
        configDirectory,
        keychainLoader: null,
      }).save(record);

      await store.clear();

      expect(keychain.entries.size).toBe(0);
      expect(await store.load()).toBeNull();
    });

    it('should tolerate missing entries', async () => {
      const store = new CredentialStore({
        serviceId: 'forcelink-test',
        configDirectory,
        keychainLoader: async () => createMemoryKeychain(),
      });

      await expect(store.clear()).resolves.toBeUndefined();
      await expect(store.clear()).resolves.toBeUndefined();
    });

    it('should keep clearing when a keychain deletion fails', async () => {
      const log = vi.fn<Log>();
      const keychain = createMemoryKeychain();
      const store = new CredentialStore({
        serviceId: 'forcelink-test',
        configDirectory,
        keychainLoader: async () => keychain,
        log,
      });

      await store.save(record);
      keychain.deletePassword = vi
        .fn<(service: string, account: string) => Promise<boolean>>()
        .mockRejectedValueOnce(new Error('locked'))
        .mockResolvedValue(true);

      await store.clear();

      expect(keychain.deletePassword).toHaveBeenCalledTimes(5);
      expect(log).toHaveBeenCalledWith(
        'warn',
        'failed to delete keychain entry',
        expect.objectContaining({ account: 'access_token' }),
      );
    });
  });
});
