import type { ApiKeyService } from './apiKeyService.js';

export interface RegenerateApiKeyResult {
  apiKey: string;
}

export class RegenerateApiKeyUseCase {
  constructor(private apiKeys: ApiKeyService) {}

  async execute(userId: string): Promise<RegenerateApiKeyResult> {
    const apiKey = await this.apiKeys.issue(userId);
    return { apiKey };
  }
}
