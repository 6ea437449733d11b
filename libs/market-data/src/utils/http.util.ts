import axios, { AxiosInstance } from 'axios';

export const createHttpClient = (baseURL: string, timeoutMs: number): AxiosInstance =>
  axios.create({
    baseURL,
    timeout: timeoutMs,
    headers: { 'User-Agent': 'venue-spread-monitor/1.0' },
  });

export const describeHttpError = (error: unknown): string => {
  if (axios.isCancel(error)) {
    return 'cancelled';
  }
  if (axios.isAxiosError(error)) {
    return error.response ? `HTTP ${error.response.status}` : error.code ?? error.message;
  }
  return error instanceof Error ? error.message : 'Unknown error';
};
