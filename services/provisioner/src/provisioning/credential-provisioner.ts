import { ValidationError } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import type { Prompter } from '../prompts/prompter.js';
import type { KeyValueStore, StoreKey } from '../store/key-value-store.js';
import { ADMIN_IDS_HINT, isValidAdminIds, normalizeAdminIds } from './admin-ids.js';
import { generateValue, type GeneratedKind } from './secrets.js';

export interface CredentialProvisionerOptions {
  store: KeyValueStore;
  prompter: Prompter;
  logger: Logger;
  maxAdminIdAttempts?: number;
}

export const DEFAULT_ADMIN_ID_ATTEMPTS = 10;

const withCurrent = (question: string, current: string | undefined, suffix = ''): string =>
  current ? `${question} [${current}]${suffix}` : `${question}${suffix}`;

/**
 * Collects setup values. Each accepted answer is written to the store before
 * the next question is asked.
 */
export class CredentialProvisioner {
  private readonly store: KeyValueStore;
  private readonly prompter: Prompter;
  private readonly logger: Logger;
  private readonly maxAdminIdAttempts: number;

  constructor(options: CredentialProvisionerOptions) {
    this.store = options.store;
    this.prompter = options.prompter;
    this.logger = options.logger;
    this.maxAdminIdAttempts = options.maxAdminIdAttempts ?? DEFAULT_ADMIN_ID_ATTEMPTS;
  }

  async askRequired(key: StoreKey, question: string): Promise<string> {
    const current = (await this.store.get(key)) || undefined;
    let value = '';

    while (!value) {
      const answer = (await this.prompter.input(withCurrent(question, current))).trim();
      value = answer || current || '';
      if (!value) {
        this.prompter.say('This value is required.');
      }
    }

    await this.store.set(key, value);
    return value;
  }

  async askGenerated(key: StoreKey, question: string, kind: GeneratedKind): Promise<string> {
    const current = (await this.store.get(key)) || undefined;
    const answer = (
      await this.prompter.input(withCurrent(question, current, ' (blank = random)'))
    ).trim();

    let value = answer || current;
    if (!value) {
      value = generateValue(kind);
      this.prompter.say(`→ generated: ${value}`);
      this.logger.debug({ key, kind }, 'Generated value');
    }

    await this.store.set(key, value);
    return value;
  }

  /**
   * Asks until the stored list is valid, at most `maxAdminIdAttempts` times.
   * An existing valid value is accepted on empty input.
   */
  async askAdminIds(question = 'What are your Telegram admin IDs (comma-separated)'): Promise<string> {
    for (let attempt = 1; attempt <= this.maxAdminIdAttempts; attempt += 1) {
      const raw = await this.askRequired('ADMIN_IDS', question);

      if (isValidAdminIds(raw)) {
        const normalized = normalizeAdminIds(raw);
        if (normalized !== raw) {
          await this.store.set('ADMIN_IDS', normalized);
        }
        return normalized;
      }

      this.prompter.say(ADMIN_IDS_HINT);
      this.logger.debug({ attempt }, 'Rejected ADMIN_IDS');
      // The invalid answer must not come back as the default.
      await this.store.set('ADMIN_IDS', '');
    }

    throw new ValidationError(
      `ADMIN_IDS still invalid after ${this.maxAdminIdAttempts} attempts.`,
      { attempts: this.maxAdminIdAttempts },
    );
  }
}
