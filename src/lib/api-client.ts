/**
 * API Client Helper
 * 提供指令共用的服務建立函數
 */

import { AuthService } from '../services/auth.js';
import { CredentialStore } from '../services/credentials.js';
import { YahooFantasyClient } from '../services/api.js';
import { StandingsExporter } from '../services/exporter.js';
import { StandingsService } from '../services/standings.js';

export interface ClientPaths {
  credentialsFile: string;
}

export interface ServicePaths extends ClientPaths {
  outputDir: string;
}

export function createAuthService(paths: ClientPaths): AuthService {
  return new AuthService(new CredentialStore(paths.credentialsFile));
}

/**
 * 建立 Yahoo API client（與其使用的 AuthService）
 */
export function getApiClient(paths: ClientPaths): { auth: AuthService; client: YahooFantasyClient } {
  const auth = createAuthService(paths);
  return { auth, client: new YahooFantasyClient(auth) };
}

export function createStandingsService(paths: ServicePaths): StandingsService {
  const { auth, client } = getApiClient(paths);
  return new StandingsService({
    auth,
    client,
    exporter: new StandingsExporter(paths.outputDir),
  });
}
