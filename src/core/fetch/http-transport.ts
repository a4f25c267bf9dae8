import { CredentialEntry } from '../../types/index.js';

/**
 * Minimal HTTP GET seam between the fetch engine and the network. The
 * default implementation uses the global fetch; tests substitute an
 * in-process stand-in.
 */

export interface HttpGetOptions {
  credentials?: CredentialEntry | null;
  timeoutMs?: number;
  accept?: string;
}

export interface HttpResponse {
  status: number;
  statusText: string;
  body: Uint8Array;
}

export interface HttpTransport {
  get(url: string, options?: HttpGetOptions): Promise<HttpResponse>;
}

export function basicAuthHeader(credentials: CredentialEntry): string {
  const token = Buffer.from(`${credentials.login}:${credentials.secret}`, 'utf8').toString('base64');
  return `Basic ${token}`;
}

export function createFetchTransport(): HttpTransport {
  return {
    async get(url: string, options: HttpGetOptions = {}): Promise<HttpResponse> {
      const headers: Record<string, string> = {};
      if (options.credentials) {
        headers.authorization = basicAuthHeader(options.credentials);
      }
      if (options.accept) {
        headers.accept = options.accept;
      }

      const response = await fetch(url, {
        headers,
        redirect: 'follow',
        signal: options.timeoutMs ? AbortSignal.timeout(options.timeoutMs) : undefined
      });

      const body = new Uint8Array(await response.arrayBuffer());
      return {
        status: response.status,
        statusText: response.statusText,
        body
      };
    }
  };
}
