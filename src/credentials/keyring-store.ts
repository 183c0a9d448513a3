/**
 * Credential storage in the operating system keychain
 */

import { Entry } from '@napi-rs/keyring';

/**
 * Where credentials are kept, per service and username
 */
export interface CredentialStore {
  get(service: string, username: string): string | null;
  set(service: string, username: string, value: string): void;
  /** Returns false when there was nothing to delete */
  delete(service: string, username: string): boolean;
}

export class KeyringStore implements CredentialStore {
  get(service: string, username: string): string | null {
    return new Entry(service, username).getPassword() ?? null;
  }

  set(service: string, username: string, value: string): void {
    new Entry(service, username).setPassword(value);
  }

  delete(service: string, username: string): boolean {
    const entry = new Entry(service, username);
    if ((entry.getPassword() ?? null) === null) {
      return false;
    }
    entry.deletePassword();
    return true;
  }
}
