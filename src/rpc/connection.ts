/**
 * Owns the chain client and its lifecycle. Every RPC call site goes through
 * {@link ChainConnection.call}, so reconnection policy lives in one place.
 */
import { isTransportError, RpcTransportError } from '../errors.js';
import { errMsg, getLogger } from '../utils/logger.js';
import type { ChainRpc } from './client.js';

const log = getLogger('rpc/connection');

export type ChainClientFactory = () => ChainRpc;

export class ChainConnection {
  private client: ChainRpc | null = null;
  private built = 0;

  constructor(private readonly factory: ChainClientFactory) {}

  /** Number of times a client was (re)built after the first one. */
  get reconnectCount(): number {
    return Math.max(0, this.built - 1);
  }

  isHealthy(): boolean {
    return this.client !== null && this.client.isHealthy();
  }

  /**
   * Tears down an unhealthy client and builds a fresh one. Returns false (and logs)
   * when construction fails; the caller retries on its next tick.
   */
  ensureConnected(): boolean {
    if (this.isHealthy()) return true;
    this.teardown();
    try {
      this.client = this.factory();
      this.built++;
      if (this.built > 1) log.info(`[rpc] reconnected (count=${this.built - 1})`);
      return true;
    } catch (err) {
      log.error(`[rpc] connect failed: ${errMsg(err)}`);
      this.client = null;
      return false;
    }
  }

  /**
   * Runs `fn` against a healthy client. A transport failure marks the connection
   * for rebuild before it is rethrown; other errors pass through untouched.
   */
  async call<T>(fn: (rpc: ChainRpc) => Promise<T>): Promise<T> {
    if (!this.ensureConnected() || !this.client) {
      throw new RpcTransportError('connect', 'chain connection unavailable');
    }
    const client = this.client;
    try {
      return await fn(client);
    } catch (err) {
      if (isTransportError(err) || !client.isHealthy()) {
        log.warn(`[rpc] transport failure, connection will be rebuilt: ${errMsg(err)}`);
        if (this.client === client) this.teardown();
      }
      throw err;
    }
  }

  close(): void {
    this.teardown();
  }

  private teardown(): void {
    if (!this.client) return;
    try {
      this.client.close();
    } catch (err) {
      log.warn(`[rpc] close failed: ${errMsg(err)}`);
    }
    this.client = null;
  }
}
