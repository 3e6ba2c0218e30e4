import { describe, expect, test } from 'vitest';
import { StateInconsistencyError } from '../errors.js';
import { AccountLookup, parseAccount } from '../indexer/accounts.js';
import { ChainConnection } from '../rpc/connection.js';
import { b64, FakeChain } from './fakes.js';

describe('AccountLookup', () => {
  test('resolves an address through the accounts query', async () => {
    const chain = new FakeChain();
    chain.accounts.set('0A1B', 12);
    const lookup = new AccountLookup(new ChainConnection(() => chain.connect()));
    await expect(lookup.resolve('0a1b')).resolves.toEqual({ index: 12, address: '0A1B' });
    expect(chain.calls).toEqual(['abci_query:/accounts/:0a1b']);
  });

  test('an unknown address is a state inconsistency', async () => {
    const chain = new FakeChain();
    const lookup = new AccountLookup(new ChainConnection(() => chain.connect()));
    await expect(lookup.resolve('0A1B')).rejects.toThrow(StateInconsistencyError);
    await expect(lookup.resolve('0A1B')).rejects.toThrow('unknown account 0A1B');
  });

  test.each(['', 'ABC', '0xZZ'])('rejects %j without querying', async (address) => {
    const chain = new FakeChain();
    const lookup = new AccountLookup(new ChainConnection(() => chain.connect()));
    await expect(lookup.resolve(address)).rejects.toThrow(StateInconsistencyError);
    expect(chain.calls).toEqual([]);
  });
});

describe('parseAccount', () => {
  test('reads the index from a string or a number', () => {
    expect(parseAccount(b64('{"index":"5","address":"ab01"}'), 'AB01')).toEqual({ index: 5, address: 'AB01' });
    expect(parseAccount(b64('{"index":6}'), 'AB01')).toEqual({ index: 6, address: 'AB01' });
  });

  test('keeps the queried address, upper-cased', () => {
    expect(parseAccount(b64('{"index":5,"address":"FFFF"}'), 'ab01')).toEqual({ index: 5, address: 'AB01' });
  });

  test('rejects values without a usable index', () => {
    expect(() => parseAccount(b64('not json'), 'AB01')).toThrow('account AB01 is not valid JSON');
    expect(() => parseAccount(b64('{"index":-1}'), 'AB01')).toThrow('account AB01 carries no index');
  });
});
