/**
 * Credential manager
 *
 * Looks credentials up in the keychain under the application's service name,
 * asking for them interactively (hidden input) when missing.
 */

import prompts from 'prompts';
import { errorMessage } from '../cli/errors.js';
import { createLogger, type Logger } from '../logging/logger.js';
import { KeyringStore, type CredentialStore } from './keyring-store.js';

/**
 * Ask the user for a secret; resolves to undefined when cancelled
 */
export type SecretPrompt = (message: string) => Promise<string | undefined>;

export interface CredentialManagerOptions {
  store?: CredentialStore;
  prompt?: SecretPrompt;
  logger?: Logger;
}

export interface GetCredentialOptions {
  /** What the credential is, used in the prompt (default 'credential') */
  description?: string;
  /** Ask for the value when it is not stored (default true) */
  prompt?: boolean;
}

export async function promptSecret(message: string): Promise<string | undefined> {
  const answers: Record<string, unknown> = await prompts({
    type: 'password',
    name: 'value',
    message,
  });

  // Ctrl+C
  const value = answers.value;
  return typeof value === 'string' ? value : undefined;
}

export class CredentialManager {
  readonly service: string;
  /** Username of the last credential read or written */
  username: string | null = null;
  /** Last credential read or written */
  credential: string | null = null;
  private readonly store: CredentialStore;
  private readonly prompt: SecretPrompt;
  private readonly logger: Logger;

  constructor(service: string, options: CredentialManagerOptions = {}) {
    this.service = service;
    this.store = options.store ?? new KeyringStore();
    this.prompt = options.prompt ?? promptSecret;
    this.logger = options.logger ?? createLogger('CredentialManager');
  }

  /**
   * Stored credential for a user, prompting for and storing it when missing.
   * Null when it is neither stored nor supplied.
   */
  async getCredential(username: string, options: GetCredentialOptions = {}): Promise<string | null> {
    const description = options.description ?? 'credential';
    this.username = username;

    let value: string | null = null;
    try {
      // an empty stored value counts as missing
      value = this.store.get(this.service, username) || null;
    } catch (error) {
      this.logger.warn('Could not read %s for %s from the keychain: %s', description, username, errorMessage(error));
    }

    if (!value && options.prompt !== false) {
      const answer = await this.prompt(`Enter ${description} for ${username}`);
      if (answer) {
        value = answer;
        this.setCredential(username, answer, description);
      }
    }

    this.credential = value;
    return value;
  }

  /**
   * Store a credential; returns false when the keychain rejects it
   */
  setCredential(username: string, value: string, description = 'credential'): boolean {
    try {
      this.store.set(this.service, username, value);
      this.username = username;
      this.credential = value;
      this.logger.debug('Stored %s for %s', description, username);
      return true;
    } catch (error) {
      this.logger.error('Could not store %s for %s: %s', description, username, errorMessage(error));
      return false;
    }
  }

  /**
   * Remove a stored credential; returns false when nothing was removed
   */
  deleteCredential(username: string): boolean {
    try {
      const deleted = this.store.delete(this.service, username);
      if (this.username === username) {
        this.credential = null;
      }
      if (!deleted) {
        this.logger.debug('No credential stored for %s', username);
      }
      return deleted;
    } catch (error) {
      this.logger.error('Could not delete credential for %s: %s', username, errorMessage(error));
      return false;
    }
  }
}
