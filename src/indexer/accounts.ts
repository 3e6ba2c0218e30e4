/**
 * Validator address -> validator index, answered by the chain application's
 * `/accounts/` ABCI query.
 */
import { StateInconsistencyError } from '../errors.js';
import type { ChainConnection } from '../rpc/connection.js';
import { base64ToBytes, bytesToHex, bytesToUtf8, hexToBytes } from '../utils/bytes.js';
import { asRecord, asUint } from '../utils/json.js';

export const ACCOUNTS_QUERY_PATH = '/accounts/';

export type Account = {
  index: number;
  /** Upper-case hex, as found in commit signatures. */
  address: string;
};

export class AccountLookup {
  constructor(private readonly conn: ChainConnection) {}

  async resolve(address: string): Promise<Account> {
    const key = hexToBytes(address);
    if (!key || key.length === 0) {
      throw new StateInconsistencyError(`invalid validator address "${address}"`, { address });
    }
    const res = await this.conn.call((rpc) => rpc.queryAbci(ACCOUNTS_QUERY_PATH, bytesToHex(key)));
    if (res.code !== 0 || res.value === null) {
      throw new StateInconsistencyError(`unknown account ${address}`, { address, code: res.code, log: res.log });
    }
    return parseAccount(res.value, address);
  }
}

/**
 * Decodes the base64 JSON account value returned by the query. The address is
 * the one queried, as commit signatures carry it; the value only adds the index.
 */
export function parseAccount(valueB64: string, address: string): Account {
  let body: unknown;
  try {
    body = JSON.parse(bytesToUtf8(base64ToBytes(valueB64)));
  } catch {
    throw new StateInconsistencyError(`account ${address} is not valid JSON`, { address });
  }
  const r = asRecord(body);
  const index = asUint(r.index);
  if (index === null) {
    throw new StateInconsistencyError(`account ${address} carries no index`, { address });
  }
  return { index, address: address.toUpperCase() };
}
