import type { AppConfig } from '../config.js';
import { BackendClient, type FetchLike } from './http.js';
import { InnoscopeApi } from './innoscope.js';
import { KickstartApi } from './kickstart.js';
import { SmartSearchApi } from './smart.js';
import { VolvoxApi } from './volvox.js';

export { BackendClient, BackendError, collectStreamLines, fileForm } from './http.js';
export type { BackendRequest, FetchLike } from './http.js';
export { VolvoxApi } from './volvox.js';
export { SmartSearchApi } from './smart.js';
export { InnoscopeApi } from './innoscope.js';
export { KickstartApi } from './kickstart.js';

// Every remote operation the catalog and the workflow toolbox can reach
export interface RemoteOperations {
  volvox: VolvoxApi;
  smart: SmartSearchApi;
  innoscope: InnoscopeApi;
  kickstart: KickstartApi;
}

export interface BackendClients {
  volvox: BackendClient;
  smart: BackendClient;
  innoscope: BackendClient;
  kickstart: BackendClient;
}

export function createBackendClients(
  config: Pick<AppConfig, 'volvoxApiUrl' | 'smartApiUrl' | 'innoscopeApiUrl' | 'kickstartApiUrl' | 'backendTimeoutMs'>,
  fetchImpl?: FetchLike
): BackendClients {
  const timeoutMs = config.backendTimeoutMs;
  return {
    volvox: new BackendClient({ service: 'Volvox', baseUrl: config.volvoxApiUrl, timeoutMs, fetch: fetchImpl }),
    smart: new BackendClient({ service: 'Smart', baseUrl: config.smartApiUrl, timeoutMs, fetch: fetchImpl }),
    innoscope: new BackendClient({ service: 'Innoscope', baseUrl: config.innoscopeApiUrl, timeoutMs, fetch: fetchImpl }),
    kickstart: new BackendClient({ service: 'Kickstart', baseUrl: config.kickstartApiUrl, timeoutMs, fetch: fetchImpl }),
  };
}

export function createRemoteOperations(clients: BackendClients): RemoteOperations {
  return {
    volvox: new VolvoxApi(clients.volvox),
    smart: new SmartSearchApi(clients.smart),
    innoscope: new InnoscopeApi(clients.innoscope),
    kickstart: new KickstartApi(clients.kickstart),
  };
}
