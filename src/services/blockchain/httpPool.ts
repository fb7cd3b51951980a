/**
 * Pooled HTTP transport for raw JSON-RPC POSTs.
 *
 * Created once at startup and injected into the router and client, so every
 * liveness check and raw call shares the same keep-alive sockets.
 */

import http from "node:http";
import https from "node:https";
import axios, { type AxiosInstance } from "axios";
import type { HttpResponse, JsonRpcTransport, PostOptions } from "../../types/rpc.js";
import { AppError, OperationCancelledError, RequestTimeoutError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

export interface HttpPoolConfig {
  /** Sockets across all hosts */
  maxSockets: number;
  maxSocketsPerHost: number;
  /** Default request timeout; callers may override per request */
  timeoutMs: number;
  keepAliveMs: number;
}

const DEFAULT_CONFIG: HttpPoolConfig = {
  maxSockets: 100,
  maxSocketsPerHost: 10,
  timeoutMs: 30_000,
  keepAliveMs: 10_000,
};

export class HttpPool implements JsonRpcTransport {
  private readonly config: HttpPoolConfig;
  private readonly httpAgent: http.Agent;
  private readonly httpsAgent: https.Agent;
  private readonly client: AxiosInstance;
  private closed = false;

  constructor(config: Partial<HttpPoolConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };

    const agentOptions = {
      keepAlive: true,
      keepAliveMsecs: this.config.keepAliveMs,
      maxSockets: this.config.maxSocketsPerHost,
      maxTotalSockets: this.config.maxSockets,
    };
    this.httpAgent = new http.Agent(agentOptions);
    this.httpsAgent = new https.Agent(agentOptions);

    this.client = axios.create({
      timeout: this.config.timeoutMs,
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
      headers: { "Content-Type": "application/json" },
      // Status handling is the caller's decision
      validateStatus: () => true,
    });

    logger.debug("HTTP pool created", {
      maxSockets: this.config.maxSockets,
      maxSocketsPerHost: this.config.maxSocketsPerHost,
      timeoutMs: this.config.timeoutMs,
    });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async post<T>(
    url: string,
    body: unknown,
    options: PostOptions = {}
  ): Promise<HttpResponse<T>> {
    if (this.closed) {
      throw new AppError("HTTP pool is closed", "HTTP_POOL_CLOSED", 500, false);
    }

    const timeoutMs = options.timeoutMs ?? this.config.timeoutMs;

    try {
      const response = await this.client.post<T>(url, body, {
        timeout: timeoutMs,
        signal: options.signal,
      });
      return { status: response.status, data: response.data };
    } catch (error) {
      if (axios.isCancel(error)) {
        throw new OperationCancelledError(`Request to ${url} cancelled`);
      }
      if (
        axios.isAxiosError(error) &&
        (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT")
      ) {
        throw new RequestTimeoutError(url, timeoutMs, error);
      }
      throw error;
    }
  }

  /**
   * Destroy pooled sockets. Safe to call more than once.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
    logger.debug("HTTP pool closed");
  }
}
