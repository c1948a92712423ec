/**
 * @file durable storage of the token record
 *
 * secrets go to the platform keychain, one entry per field, so that a write
 * never needs a read-modify-write across fields; when the keychain is
 * unavailable or rejects a write the record falls back to an owner-only file
 */

import { homedir } from 'node:os';
import { join } from 'node:path';

import { jsonifyError, MS_PER_SECOND } from '@forcelink/core';

import { DEFAULT_EXPIRES_IN_SECONDS } from '#constants/oauth';

import { loadKeyring } from './keychain';
import {
  deleteTokenFile,
  getTokenFilePath,
  loadTokenFile,
  saveTokenFile,
} from './token-file';

import type { Log } from '@forcelink/core';

import type { TokenRecord } from '#oauth/types';

import type { KeychainAdapter, KeychainLoader } from './keychain';
import type { StoredTokenFields } from './token-file';

/** keychain account of each persisted field */
export const KEYCHAIN_ACCOUNTS = {
  accessToken: 'access_token',
  refreshToken: 'refresh_token',
  instanceUrl: 'instance_url',
  expiresAt: 'expires_at',
  issuedAt: 'issued_at',
} as const satisfies Record<keyof StoredTokenFields, string>;

/** where a loaded record came from */
export type CredentialSource = 'keychain' | 'file';

/** options for the credential store */
export interface CredentialStoreOptions {
  /** namespace of every keychain entry and of the fallback directory */
  serviceId: string;
  /** base directory of the fallback file, defaults to ~/.config */
  configDirectory?: string;
  /** keychain resolver, defaults to the platform keyring; null disables the keychain */
  keychainLoader?: KeychainLoader | null;
  /** optional logging function */
  log?: Log;
}

/**
 * persists the token record in the keychain with an owner-only file fallback
 * @example
 * ```typescript
 * const store = new CredentialStore({ serviceId: 'forcelink' });
 *
 * await store.save(record);
 * const reloaded = await store.load();
 * await store.clear();
 * ```
 */
export class CredentialStore {
  #serviceId: string;
  #filePath: string;
  #keychainLoader: KeychainLoader | null;
  #keychain?: Promise<KeychainAdapter | null>;
  #log?: Log;

  /**
   * creates a credential store
   * @param options store configuration
   */
  constructor(options: CredentialStoreOptions) {
    this.#serviceId = options.serviceId;
    this.#filePath = getTokenFilePath(
      options.configDirectory ?? join(homedir(), '.config'),
      options.serviceId,
    );
    this.#keychainLoader =
      options.keychainLoader === undefined ? loadKeyring : options.keychainLoader;
    this.#log = options.log;
  }

  /** path of the fallback token file */
  public get filePath(): string {
    return this.#filePath;
  }

  /**
   * persists a record, field by field in the keychain or in the fallback file
   * @param record record to persist
   * @returns where the record was written
   */
  public async save(record: TokenRecord): Promise<CredentialSource> {
    const keychain = await this.#getKeychain();

    if (keychain) {
      try {
        await this.#saveToKeychain(keychain, record);
        this.#log?.('debug', 'saved credentials to keychain', {
          serviceId: this.#serviceId,
        });

        return 'keychain';
      } catch (exception) {
        this.#log?.('warn', 'keychain write failed, falling back to file', {
          serviceId: this.#serviceId,
          error: jsonifyError(exception),
        });
      }
    }

    await saveTokenFile(this.#filePath, record);
    this.#log?.('debug', 'saved credentials to file', {
      filePath: this.#filePath,
    });

    return 'file';
  }

  /**
   * loads the persisted record, keychain first
   * @returns the record, or null when nothing valid is stored
   */
  public async load(): Promise<TokenRecord | null> {
    const keychain = await this.#getKeychain();

    if (keychain) {
      try {
        const fields = await this.#loadFromKeychain(keychain);
        const record = fields && this.#toRecord(fields, 'keychain');

        if (record) {
          return record;
        }
      } catch (exception) {
        this.#log?.('warn', 'keychain read failed, trying file', {
          serviceId: this.#serviceId,
          error: jsonifyError(exception),
        });
      }
    }

    const fields = await loadTokenFile(this.#filePath);

    return fields && this.#toRecord(fields, 'file');
  }

  /** removes every stored field, missing entries are not an error */
  public async clear(): Promise<void> {
    const keychain = await this.#getKeychain();

    if (keychain) {
      for (const account of Object.values(KEYCHAIN_ACCOUNTS)) {
        try {
          // resolves false when the entry doesn't exist
          await keychain.deletePassword(this.#serviceId, account);
        } catch (exception) {
          this.#log?.('warn', 'failed to delete keychain entry', {
            serviceId: this.#serviceId,
            account,
            error: jsonifyError(exception),
          });
        }
      }
    }

    await deleteTokenFile(this.#filePath);
    this.#log?.('info', 'cleared stored credentials', {
      serviceId: this.#serviceId,
    });
  }

  /**
   * resolves the keychain once per store
   * @returns keychain adapter or null when unavailable
   */
  async #getKeychain(): Promise<KeychainAdapter | null> {
    const loader = this.#keychainLoader;

    if (!loader) {
      return null;
    }

    this.#keychain ??= loader().then((keychain) => {
      if (!keychain) {
        this.#log?.('info', 'keychain unavailable, using file storage', {
          filePath: this.#filePath,
        });
      }

      return keychain;
    });

    return this.#keychain;
  }

  /**
   * writes each field under its own keychain account
   * @param keychain keychain adapter
   * @param record record to persist
   */
  async #saveToKeychain(
    keychain: KeychainAdapter,
    record: TokenRecord,
  ): Promise<void> {
    const service = this.#serviceId;

    await keychain.setPassword(
      service,
      KEYCHAIN_ACCOUNTS.accessToken,
      record.accessToken,
    );

    if (record.refreshToken) {
      await keychain.setPassword(
        service,
        KEYCHAIN_ACCOUNTS.refreshToken,
        record.refreshToken,
      );
    } else {
      await keychain.deletePassword(service, KEYCHAIN_ACCOUNTS.refreshToken);
    }

    await keychain.setPassword(
      service,
      KEYCHAIN_ACCOUNTS.instanceUrl,
      record.instanceUrl,
    );
    await keychain.setPassword(
      service,
      KEYCHAIN_ACCOUNTS.expiresAt,
      String(record.expiresAt),
    );
    await keychain.setPassword(
      service,
      KEYCHAIN_ACCOUNTS.issuedAt,
      String(record.issuedAt),
    );
  }

  /**
   * reads every field from the keychain
   * @param keychain keychain adapter
   * @returns raw fields, or null when no access token is stored
   */
  async #loadFromKeychain(
    keychain: KeychainAdapter,
  ): Promise<StoredTokenFields | null> {
    const read = async (account: string): Promise<string | null> =>
      keychain.getPassword(this.#serviceId, account);

    const accessToken = await read(KEYCHAIN_ACCOUNTS.accessToken);

    if (!accessToken) {
      return null;
    }

    return {
      accessToken,
      refreshToken: await read(KEYCHAIN_ACCOUNTS.refreshToken),
      instanceUrl: await read(KEYCHAIN_ACCOUNTS.instanceUrl),
      expiresAt: await read(KEYCHAIN_ACCOUNTS.expiresAt),
      issuedAt: await read(KEYCHAIN_ACCOUNTS.issuedAt),
    };
  }

  /**
   * validates raw fields into a record
   * @param fields raw stored fields
   * @param source where the fields were read from
   * @returns the record, or null when a field is missing or malformed
   */
  #toRecord(
    fields: StoredTokenFields,
    source: CredentialSource,
  ): TokenRecord | null {
    const { accessToken, refreshToken, instanceUrl } = fields;
    const expiresAt = parseTimestamp(fields.expiresAt);
    // records written without an issue time are assumed to carry the default lifetime
    const issuedAt =
      fields.issuedAt === null
        ? expiresAt - DEFAULT_EXPIRES_IN_SECONDS * MS_PER_SECOND
        : parseTimestamp(fields.issuedAt);

    if (
      !accessToken ||
      !instanceUrl ||
      Number.isNaN(expiresAt) ||
      Number.isNaN(issuedAt) ||
      issuedAt >= expiresAt
    ) {
      this.#log?.('warn', 'ignoring malformed stored credentials', {
        source,
        hasAccessToken: !!accessToken,
        hasInstanceUrl: !!instanceUrl,
        expiresAt: fields.expiresAt,
        issuedAt: fields.issuedAt,
      });

      return null;
    }

    this.#log?.('debug', 'loaded stored credentials', {
      source,
      hasRefreshToken: !!refreshToken,
      expiresAt: new Date(expiresAt).toISOString(),
    });

    return {
      accessToken,
      ...(refreshToken ? { refreshToken } : {}),
      instanceUrl,
      issuedAt,
      expiresAt,
    };
  }
}

/**
 * parses a stored epoch millisecond timestamp
 * @param value raw stored value
 * @returns the timestamp, NaN when absent or not an integer
 */
function parseTimestamp(value: string | null): number {
  return value !== null && /^\d+$/.test(value) ? Number(value) : Number.NaN;
}
