import { AxiosError, AxiosHeaders, AxiosResponse, RawAxiosResponseHeaders } from 'axios';

export function axiosResponse<T>(
  data: T,
  status = 200,
  headers: RawAxiosResponseHeaders = {},
): AxiosResponse<T> {
  return {
    data,
    status,
    statusText: String(status),
    headers,
    config: { headers: new AxiosHeaders() },
  };
}

export function axiosError(status: number): AxiosError {
  const response = axiosResponse<unknown>({}, status);
  return new AxiosError(
    `Request failed with status code ${status}`,
    'ERR_BAD_RESPONSE',
    response.config,
    undefined,
    response,
  );
}
