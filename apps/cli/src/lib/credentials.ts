/**
 * Credential provider backed by the loaded configuration
 */

import type { CredentialProvider, Credentials } from '@hiresdl/core';
import type { CliConfig } from '../config/index.js';

export class ConfigCredentialProvider implements CredentialProvider {
  constructor(private readonly config: Pick<CliConfig, 'appId' | 'secrets'>) {}

  async getCredentials(): Promise<Credentials> {
    return { appId: this.config.appId, secrets: [...this.config.secrets] };
  }
}
