// src/services/httpClient.ts
import axios, { AxiosInstance } from 'axios';

/**
 * Cria um cliente axios com os interceptors de log usados por todos os
 * serviços HTTP (Google Sheets e o worker de automação).
 */
export function createHttpClient(baseURL: string, timeout = 60000): AxiosInstance {
  const client = axios.create({ baseURL, timeout });

  // Intercepta o REQUEST
  client.interceptors.request.use((config) => {
    // console.log(`[Request] ${config.method?.toUpperCase()} ${config.url}`);
    return config;
  }, (error) => {
    console.error('[Request Error]', error);
    return Promise.reject(error);
  });

  // Intercepta o RESPONSE
  client.interceptors.response.use((response) => response, (error) => {
    if (axios.isAxiosError(error)) {
      console.error(`[Response Error] ${error.config?.url ?? ''}`, error.response?.status, error.response?.data ?? error.message);
    }
    return Promise.reject(error);
  });

  return client;
}
