/**
 * @file access to the platform keychain
 *
 * the keychain is reached through `@napi-rs/keyring`; when its binding cannot
 * be loaded callers fall back to file storage
 */

/** secret storage keyed by service and account */
export interface KeychainAdapter {
  /**
   * reads a secret
   * @param service namespaced service identifier
   * @param account field name
   * @returns the secret or null when absent
   */
  getPassword(service: string, account: string): Promise<string | null>;

  /**
   * writes a secret, replacing any previous value
   * @param service namespaced service identifier
   * @param account field name
   * @param password secret value
   */
  setPassword(service: string, account: string, password: string): Promise<void>;

  /**
   * deletes a secret
   * @param service namespaced service identifier
   * @param account field name
   * @returns true when a secret was deleted, false when none existed
   */
  deletePassword(service: string, account: string): Promise<boolean>;
}

/** resolves a keychain adapter, or null when no keychain is available */
export type KeychainLoader = () => Promise<KeychainAdapter | null>;

/**
 * loads the platform keyring lazily, one entry per service and account
 * @returns the keyring as a keychain adapter, or null when it is unavailable
 */
export async function loadKeyring(): Promise<KeychainAdapter | null> {
  try {
    const { Entry } = await import('@napi-rs/keyring');

    return {
      getPassword: async (service, account) =>
        new Entry(service, account).getPassword() ?? null,
      setPassword: async (service, account, password) => {
        new Entry(service, account).setPassword(password);
      },
      deletePassword: async (service, account) =>
        new Entry(service, account).deletePassword(),
    };
  } catch {
    // no prebuilt binding for this platform, the file store takes over
    return null;
  }
}
