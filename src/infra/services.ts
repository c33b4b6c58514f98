import { Clock, systemClock } from '../domain/auth/clock.js';
import { Password, type CredentialHasher } from '../domain/auth/password.js';
import { AccessControl } from '../application/auth/accessControl.js';
import { ApiKeyService } from '../application/auth/apiKeyService.js';
import { ChangePasswordUseCase } from '../application/auth/changePassword.js';
import { LoginUseCase } from '../application/auth/login.js';
import { LogoutUseCase } from '../application/auth/logout.js';
import type { AuthStore } from '../application/auth/ports.js';
import { GetProfileUseCase } from '../application/auth/profile.js';
import { RefreshAccessUseCase } from '../application/auth/refresh.js';
import { RegenerateApiKeyUseCase } from '../application/auth/regenerateApiKey.js';
import { RegisterUseCase } from '../application/auth/register.js';
import { TokenService } from '../application/auth/tokenService.js';
import { UsageRecorder } from '../application/auth/usageRecorder.js';
import { ListUsersUseCase } from '../application/admin/listUsers.js';
import { ToggleActiveUseCase } from '../application/admin/toggleActive.js';
import { UsageStatsUseCase } from '../application/admin/usageStats.js';
import type { AppConfig } from './config.js';

export interface Services {
  store: AuthStore;
  tokens: TokenService;
  apiKeys: ApiKeyService;
  accessControl: AccessControl;
  usageRecorder: UsageRecorder;
  register: RegisterUseCase;
  login: LoginUseCase;
  refresh: RefreshAccessUseCase;
  logout: LogoutUseCase;
  changePassword: ChangePasswordUseCase;
  regenerateApiKey: RegenerateApiKeyUseCase;
  profile: GetProfileUseCase;
  listUsers: ListUsersUseCase;
  toggleActive: ToggleActiveUseCase;
  usageStats: UsageStatsUseCase;
}

export interface ServiceOptions {
  store: AuthStore;
  jwt: AppConfig['jwt'];
  hasher?: CredentialHasher;
  clock?: Clock;
}

/**
 * Wire the auth core around one store. The store should already be wrapped
 * in GuardedAuthStore when it talks to a real backend.
 */
export function createServices(options: ServiceOptions): Services {
  const { store } = options;
  const clock = options.clock ?? systemClock;
  const hasher = options.hasher ?? new Password();

  const tokens = new TokenService({ ...options.jwt, clock }, store);
  const apiKeys = new ApiKeyService(store);

  return {
    store,
    tokens,
    apiKeys,
    accessControl: new AccessControl(tokens, apiKeys, store),
    usageRecorder: new UsageRecorder(store, clock),
    register: new RegisterUseCase(store, hasher),
    login: new LoginUseCase(store, hasher, tokens, clock),
    refresh: new RefreshAccessUseCase(store, tokens),
    logout: new LogoutUseCase(tokens),
    changePassword: new ChangePasswordUseCase(store, hasher),
    regenerateApiKey: new RegenerateApiKeyUseCase(apiKeys),
    profile: new GetProfileUseCase(store, store, clock),
    listUsers: new ListUsersUseCase(store),
    toggleActive: new ToggleActiveUseCase(store),
    usageStats: new UsageStatsUseCase(store, store, clock),
  };
}
