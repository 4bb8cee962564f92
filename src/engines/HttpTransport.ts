/**
 * Transporte HTTP del motor: HEAD para el preflight y GET con Range para cada chunk.
 *
 * El motor depende solo de la interfaz HttpTransport (permite inyectar fakes en tests);
 * AxiosTransport es la implementación por defecto. El status se valida en el motor, no aquí:
 * validateStatus acepta cualquier código. Se pide `Accept-Encoding: identity` para que los
 * offsets de Range se refieran a los bytes que se guardan en disco.
 *
 * @module HttpTransport
 */

import axios from 'axios';
import type { AxiosInstance, AxiosResponse } from 'axios';
import { Readable } from 'stream';
import config from '../config';
import { ERRORS } from '../constants/errors';
import { UpstreamError } from './errors';

/** Cabeceras de respuesta normalizadas: nombres en minúsculas, valores string. */
export type HeaderMap = Record<string, string>;

export interface HttpHeadResponse {
  status: number;
  headers: HeaderMap;
}

export interface HttpGetResponse extends HttpHeadResponse {
  body: Readable;
}

export interface HttpTransport {
  head(_url: string): Promise<HttpHeadResponse>;
  get(_url: string, _headers: Record<string, string>): Promise<HttpGetResponse>;
}

export interface AxiosTransportOptions {
  /** Timeout por petición en ms; 0 = sin límite. */
  timeoutMs?: number;
  /** Instancia de axios a usar (p. ej. con adapter propio). */
  client?: AxiosInstance;
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

function normalizeHeaders(raw: AxiosResponse['headers']): HeaderMap {
  const headers: HeaderMap = {};
  for (const [name, value] of Object.entries(raw)) {
    if (value === undefined || value === null) continue;
    headers[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : String(value);
  }
  return headers;
}

export class AxiosTransport implements HttpTransport {
  private readonly client: AxiosInstance;
  private readonly timeoutMs: number;

  constructor(options: AxiosTransportOptions = {}) {
    this.client = options.client ?? axios.create();
    this.timeoutMs = options.timeoutMs ?? config.network.requestTimeoutMs;
  }

  private baseHeaders(): Record<string, string> {
    return {
      'User-Agent': config.network.userAgent,
      'Accept-Encoding': 'identity',
      Accept: '*/*',
    };
  }

  async head(url: string): Promise<HttpHeadResponse> {
    const response = await this.client.head(url, {
      headers: this.baseHeaders(),
      timeout: this.timeoutMs,
      validateStatus: () => true,
    });
    return { status: response.status, headers: normalizeHeaders(response.headers) };
  }

  async get(url: string, headers: Record<string, string>): Promise<HttpGetResponse> {
    const response = await this.client.get<unknown>(url, {
      headers: { ...this.baseHeaders(), ...headers },
      timeout: this.timeoutMs,
      responseType: 'stream',
      decompress: false,
      validateStatus: () => true,
    });
    const body: unknown = response.data;
    if (!(body instanceof Readable)) {
      throw new UpstreamError(url, response.status, ERRORS.UPSTREAM.BODY_NOT_STREAM);
    }
    return { status: response.status, headers: normalizeHeaders(response.headers), body };
  }
}
