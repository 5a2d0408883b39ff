import axios, { AxiosRequestConfig } from 'axios';

export const DEFAULT_TIMEOUT_MS = 10000;

/**
 * The slice of an axios instance the clients use; tests pass a fake.
 */
export interface HttpClient {
  get(url: string, config?: AxiosRequestConfig): Promise<{ data: unknown }>;
}

export function createHttpClient(baseURL: string): HttpClient {
  return axios.create({ baseURL, timeout: DEFAULT_TIMEOUT_MS });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Log what we know about a failed request (status, truncated body)
 */
export function logHttpError(source: string, error: unknown): void {
  console.error(`  ${source} API Error:`, errorMessage(error));
  if (axios.isAxiosError(error) && error.response) {
    console.error('  Response status:', error.response.status);
    const body = error.response.data;
    const text = typeof body === 'string' ? body : JSON.stringify(body) ?? '';
    console.error('  Response data:', text.substring(0, 500));
  }
}
