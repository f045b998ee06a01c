import axios, { type AxiosInstance } from 'axios';
import { withRetry } from './retry.js';

export const createHttpClient = (baseURL: string, timeoutMs = 10000): AxiosInstance => {
  return axios.create({
    baseURL,
    timeout: timeoutMs
  });
};

export const postJson = async <TReq, TRes>(
  client: AxiosInstance,
  path: string,
  body: TReq,
  headers?: Record<string, string>,
  retries = 1
): Promise<TRes> => {
  const res = await withRetry(() => client.post<TRes>(path, body, { headers }), retries);
  return res.data;
};
